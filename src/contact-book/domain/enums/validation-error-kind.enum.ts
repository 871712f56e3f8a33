export enum ValidationErrorKind {
  INVALID_NAME = 'InvalidName',
  INVALID_PHONE = 'InvalidPhone',
  INVALID_BIRTHDAY = 'InvalidBirthday',
}
