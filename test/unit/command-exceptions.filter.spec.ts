import { CommandExceptionsFilter } from '../../src/shared/filters/command-exceptions.filter';
import { ValidationException } from '../../src/contact-book/domain/exceptions/validation.exception';
import { ValidationErrorKind } from '../../src/contact-book/domain/enums/validation-error-kind.enum';
import { ContactNotFoundException } from '../../src/contact-book/domain/exceptions/contact-not-found.exception';
import { DuplicateContactException } from '../../src/contact-book/domain/exceptions/duplicate-contact.exception';
import { UsageException } from '../../src/contact-book/domain/exceptions/usage.exception';

describe('CommandExceptionsFilter', () => {
  let filter: CommandExceptionsFilter;

  beforeEach(() => {
    filter = new CommandExceptionsFilter();
  });

  it('should return the message of a validation failure', () => {
    const error = new ValidationException(
      ValidationErrorKind.INVALID_PHONE,
      'Phone must contain only digits and be 10 symbols long',
    );

    expect(filter.catch(error, 'add')).toBe(
      'Phone must contain only digits and be 10 symbols long',
    );
  });

  it('should return the message of lookup and usage failures', () => {
    expect(filter.catch(new ContactNotFoundException('Bob'), 'phone')).toBe(
      "Contact with name 'Bob' not found in address book",
    );
    expect(filter.catch(new DuplicateContactException('Bob'), 'add')).toBe(
      "Contact with name 'Bob' already exists",
    );
    expect(filter.catch(new UsageException('phone <name>'), 'phone')).toBe(
      'Not enough arguments. Usage: phone <name>',
    );
  });

  it('should report unexpected errors generically', () => {
    expect(filter.catch(new Error('boom'), 'add')).toBe(
      'Something went wrong: boom',
    );
    expect(filter.catch('oops', 'add')).toBe('Something went wrong: oops');
  });
});
