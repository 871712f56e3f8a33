import { Injectable, Inject } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';
import { IClock } from '../interfaces/clock.interface';
import { INJECTION_TOKENS } from '../../../shared/constants/injection-tokens';

export interface DaysToBirthdayOutput {
  displayName: string;
  days: number;
}

@Injectable()
export class DaysToBirthdayUseCase {
  constructor(
    private readonly addressBook: AddressBook,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
  ) {}

  execute(name: string): DaysToBirthdayOutput {
    const record = this.addressBook.get(name);
    if (!record) {
      throw new ContactNotFoundException(name);
    }

    return {
      displayName: record.name.toTitleCase(),
      days: record.daysToBirthday(this.clock.today()),
    };
  }
}
