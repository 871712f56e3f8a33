import { ValidationErrorKind } from '../enums/validation-error-kind.enum';
import { ValidationException } from '../exceptions/validation.exception';

export class Phone {
  readonly value: string;

  constructor(phone: string) {
    if (!Phone.isValid(phone)) {
      throw new ValidationException(
        ValidationErrorKind.INVALID_PHONE,
        'Phone must contain only digits and be 10 symbols long',
      );
    }
    this.value = phone;
  }

  static isValid(phone: string): boolean {
    return /^[0-9]{10}$/.test(phone);
  }

  equals(other: Phone): boolean {
    return this.value === other.value;
  }
}
