import { Injectable, Logger } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';
import { ContactRecord } from '../../domain/entities/contact-record.entity';
import { ContactNotFoundException } from '../../domain/exceptions/contact-not-found.exception';

@Injectable()
export class DeleteContactUseCase {
  private readonly logger = new Logger(DeleteContactUseCase.name);

  constructor(private readonly addressBook: AddressBook) {}

  execute(name: string): ContactRecord {
    const record = this.addressBook.deleteRecord(name);
    if (!record) {
      throw new ContactNotFoundException(name);
    }

    this.logger.log(`Deleted contact ${name}`);
    return record;
  }
}
