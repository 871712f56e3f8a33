import { Injectable, Logger } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactRecord } from '../../domain/entities/contact-record.entity';
import { Phone } from '../../domain/value-objects/phone.vo';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';
import { PhoneNotFoundException } from '../../domain/exceptions/phone-not-found.exception';

@Injectable()
export class DeletePhoneUseCase {
  private readonly logger = new Logger(DeletePhoneUseCase.name);

  constructor(private readonly addressBook: AddressBook) {}

  execute(name: string, phone: string): ContactRecord {
    const record = this.addressBook.get(name);
    if (!record) {
      throw new ContactNotFoundException(name);
    }

    const target = new Phone(phone);
    if (!record.removePhone(target)) {
      throw new PhoneNotFoundException(target.value, name);
    }

    this.logger.log(`Removed phone ${target.value} from ${name}`);
    return record;
  }
}
