import { Injectable, Logger } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactRecord } from '../../domain/entities/contact-record.entity';
import { Name } from '../../domain/value-objects/name.vo';
import { Phone } from '../../domain/value-objects/phone.vo';
import { Birthday } from '../../domain/value-objects/birthday.vo';
import { DuplicateContactException } from '../../domain/exceptions/duplicate-contact.exception';

export interface AddContactInput {
  name: string;
  phone: string;
  birthday?: string;
}

@Injectable()
export class AddContactUseCase {
  private readonly logger = new Logger(AddContactUseCase.name);

  constructor(private readonly addressBook: AddressBook) {}

  execute(input: AddContactInput): ContactRecord {
    // Build every value first so a bad birthday leaves nothing behind
    const name = new Name(input.name);
    const phone = new Phone(input.phone);
    const birthday =
      input.birthday !== undefined ? new Birthday(input.birthday) : null;

    const record = new ContactRecord({ name, phones: [phone], birthday });
    if (!this.addressBook.addRecord(record)) {
      throw new DuplicateContactException(name.value);
    }

    this.logger.log(`Added contact ${name.value}`);
    return record;
  }
}
