import { Injectable, Logger } from '@nestjs/common';
import { ValidationException } from '../../contact-book/domain/exceptions/validation.exception';
import { ContactNotFoundException } from '../../contact-book/domain/exceptions/contact-not-found.exception';
import { DuplicateContactException } from '../../contact-book/domain/exceptions/duplicate-contact.exception';
import { PhoneNotFoundException } from '../../contact-book/domain/exceptions/phone-not-found.exception';
import { NoBirthdayException } from '../../contact-book/domain/exceptions/no-birthday.exception';
import { UsageException } from '../../contact-book/domain/exceptions/usage.exception';

/**
 * Turns anything a command handler throws into the line shown to the user.
 * Domain exceptions print their own message; anything else is logged with
 * its stack and reported generically. The session always continues.
 */
@Injectable()
export class CommandExceptionsFilter {
  private readonly logger = new Logger(CommandExceptionsFilter.name);

  catch(exception: unknown, command: string): string {
    if (exception instanceof ValidationException) {
      this.logger.warn(`${command} - ${exception.kind}: ${exception.message}`);
      return exception.message;
    }

    if (
      exception instanceof ContactNotFoundException ||
      exception instanceof PhoneNotFoundException ||
      exception instanceof DuplicateContactException ||
      exception instanceof NoBirthdayException ||
      exception instanceof UsageException
    ) {
      this.logger.warn(`${command} - ${exception.name}: ${exception.message}`);
      return exception.message;
    }

    const message =
      exception instanceof Error ? exception.message : String(exception);
    this.logger.error(
      `${command} failed`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    return `Something went wrong: ${message}`;
  }
}
