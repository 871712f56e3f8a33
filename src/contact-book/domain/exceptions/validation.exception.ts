import { ValidationErrorKind } from '../enums/validation-error-kind.enum';

export class ValidationException extends Error {
  constructor(
    readonly kind: ValidationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationException';
  }
}
