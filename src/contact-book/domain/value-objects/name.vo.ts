import { ValidationErrorKind } from '../enums/validation-error-kind.enum';
import { ValidationException } from '../exceptions/validation.exception';

export class Name {
  readonly value: string;

  constructor(name: string) {
    if (!Name.isValid(name)) {
      throw new ValidationException(
        ValidationErrorKind.INVALID_NAME,
        'Name must contain only letters and be 1-20 symbols long',
      );
    }
    this.value = name;
  }

  static isValid(name: string): boolean {
    return /^[A-Za-z]{1,20}$/.test(name);
  }

  /** Upper-cases the first letter and lower-cases the rest. */
  toTitleCase(): string {
    return this.value.charAt(0).toUpperCase() + this.value.slice(1).toLowerCase();
  }

  equals(other: Name): boolean {
    return this.value === other.value;
  }
}
