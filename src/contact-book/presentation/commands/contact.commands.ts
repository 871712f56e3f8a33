import { Injectable } from '@nestjs/common';
import { AddContactUseCase } from '../../application/use-cases/add-contact.use-case';
import { ChangePhoneUseCase } from '../../application/use-cases/change-phone.use-case';
import { DeletePhoneUseCase } from '../../application/use-cases/delete-phone.use-case';
import { GetContactUseCase } from '../../application/use-cases/get-contact.use-case';
import { DeleteContactUseCase } from '../../application/use-cases/delete-contact.use-case';
import { ListContactsUseCase } from '../../application/use-cases/list-contacts.use-case';
import { DaysToBirthdayUseCase } from '../../application/use-cases/days-to-birthday.use-case';
import { UsageException } from '../../domain/exceptions/usage.exception';

export const USAGE = {
  ADD: 'add <name> <phone> [DD.MM.YYYY]',
  CHANGE: 'change <name> <old phone> <new phone>',
  DELETE_PHONE: 'del <name> <phone>',
  PHONE: 'phone <name>',
  SHOW: 'show [all | <count>]',
  REMOVE: 'remove <name>',
  DAYS: 'days <name>',
} as const;

function requireArgs(args: string[], count: number, usage: string): void {
  if (args.length < count) {
    throw new UsageException(usage);
  }
}

/**
 * One method per console command. Each takes the positional arguments left
 * after the alias and returns the text to print; failures are thrown and
 * translated by the dispatcher.
 */
@Injectable()
export class ContactCommands {
  constructor(
    private readonly addContactUseCase: AddContactUseCase,
    private readonly changePhoneUseCase: ChangePhoneUseCase,
    private readonly deletePhoneUseCase: DeletePhoneUseCase,
    private readonly getContactUseCase: GetContactUseCase,
    private readonly deleteContactUseCase: DeleteContactUseCase,
    private readonly listContactsUseCase: ListContactsUseCase,
    private readonly daysToBirthdayUseCase: DaysToBirthdayUseCase,
  ) {}

  greeting(): string {
    return 'How can I help you?';
  }

  farewell(): string {
    return 'Good bye';
  }

  addContact(args: string[]): string {
    requireArgs(args, 2, USAGE.ADD);
    const record = this.addContactUseCase.execute({
      name: args[0],
      phone: args[1],
      birthday: args.length > 2 ? args[2] : undefined,
    });
    return `Contact ${record.name.value} has added successfully.`;
  }

  changeNumber(args: string[]): string {
    requireArgs(args, 3, USAGE.CHANGE);
    const record = this.changePhoneUseCase.execute(args[0], args[1], args[2]);
    return `Contact ${record.name.value} has changed successfully.`;
  }

  deleteNumber(args: string[]): string {
    requireArgs(args, 2, USAGE.DELETE_PHONE);
    const record = this.deletePhoneUseCase.execute(args[0], args[1]);
    return `Phone ${args[1]} has deleted successfully from contact ${record.name.value}.`;
  }

  printPhone(args: string[]): string {
    requireArgs(args, 1, USAGE.PHONE);
    return this.getContactUseCase.execute(args[0]).toString();
  }

  deleteContact(args: string[]): string {
    requireArgs(args, 1, USAGE.REMOVE);
    const record = this.deleteContactUseCase.execute(args[0]);
    return `Contact ${record.name.value} has deleted successfully.`;
  }

  showAll(args: string[]): string {
    if (args.length === 0 || args[0].toLowerCase() === 'all') {
      return this.listContactsUseCase.execute();
    }

    const limit = Number(args[0]);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new UsageException(USAGE.SHOW, 'Count must be a positive integer');
    }
    return this.listContactsUseCase.execute(limit);
  }

  daysToBirthday(args: string[]): string {
    requireArgs(args, 1, USAGE.DAYS);
    const { displayName, days } = this.daysToBirthdayUseCase.execute(args[0]);
    return `${displayName} has ${days} days to birthday.`;
  }
}
