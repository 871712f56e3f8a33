import { Module } from '@nestjs/common';

// Domain
import { AddressBook } from './domain/entities/address-book.entity';

// Application - Use Cases
import { AddContactUseCase } from './application/use-cases/add-contact.use-case';
import { ChangePhoneUseCase } from './application/use-cases/change-phone.use-case';
import { DeletePhoneUseCase } from './application/use-cases/delete-phone.use-case';
import { GetContactUseCase } from './application/use-cases/get-contact.use-case';
import { DeleteContactUseCase } from './application/use-cases/delete-contact.use-case';
import { ListContactsUseCase } from './application/use-cases/list-contacts.use-case';
import { DaysToBirthdayUseCase } from './application/use-cases/days-to-birthday.use-case';

// Infrastructure
import { SystemClock } from './infrastructure/clock/system-clock';

// Presentation
import { ContactCommands } from './presentation/commands/contact.commands';
import { CommandDispatcher } from './presentation/commands/command-dispatcher';
import { ConsoleShell } from './presentation/cli/console-shell';

// Shared
import { AppConfigModule } from '../shared/config/app-config.module';
import { CommandExceptionsFilter } from '../shared/filters/command-exceptions.filter';
import { INJECTION_TOKENS } from '../shared/constants/injection-tokens';

@Module({
  imports: [AppConfigModule],
  providers: [
    // One book per application context, shared by every use case
    {
      provide: AddressBook,
      useFactory: () => new AddressBook(),
    },

    // Application use cases
    AddContactUseCase,
    ChangePhoneUseCase,
    DeletePhoneUseCase,
    GetContactUseCase,
    DeleteContactUseCase,
    ListContactsUseCase,
    DaysToBirthdayUseCase,

    // Infrastructure: bind interfaces → implementations
    {
      provide: INJECTION_TOKENS.CLOCK,
      useClass: SystemClock,
    },

    // Presentation
    CommandExceptionsFilter,
    ContactCommands,
    CommandDispatcher,
    ConsoleShell,
  ],
  exports: [CommandDispatcher, ConsoleShell],
})
export class ContactBookModule {}
