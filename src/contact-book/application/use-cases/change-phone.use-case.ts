import { Injectable, Logger } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactRecord } from '../../domain/entities/contact-record.entity';
import { Phone } from '../../domain/value-objects/phone.vo';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';
import { PhoneNotFoundException } from '../../domain/exceptions/phone-not-found.exception';

@Injectable()
export class ChangePhoneUseCase {
  private readonly logger = new Logger(ChangePhoneUseCase.name);

  constructor(private readonly addressBook: AddressBook) {}

  execute(name: string, oldPhone: string, newPhone: string): ContactRecord {
    const record = this.addressBook.get(name);
    if (!record) {
      throw new ContactNotFoundException(name);
    }

    const from = new Phone(oldPhone);
    const to = new Phone(newPhone);
    if (!record.changePhone(from, to)) {
      throw new PhoneNotFoundException(from.value, name);
    }

    this.logger.log(`Changed phone of ${name}`);
    this.logger.debug(`${name}: ${from.value} -> ${to.value}`);
    return record;
  }
}
