import { Injectable } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactRecord } from '../../domain/entities/contact-record.entity';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';

@Injectable()
export class GetContactUseCase {
  constructor(private readonly addressBook: AddressBook) {}

  execute(name: string): ContactRecord {
    const record = this.addressBook.get(name);
    if (!record) {
      throw new ContactNotFoundException(name);
    }
    return record;
  }
}
