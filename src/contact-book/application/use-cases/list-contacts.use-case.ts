import { Injectable, Logger } from '@nestjs/common';
import { AddressBook } from '../../domain/entities/address-book.entity';

@Injectable()
export class ListContactsUseCase {
  private readonly logger = new Logger(ListContactsUseCase.name);

  constructor(private readonly addressBook: AddressBook) {}

  /** Renders the whole book, or only its first `limit` contacts. */
  execute(limit?: number): string {
    this.logger.debug(
      `Listing ${limit ?? 'all'} of ${this.addressBook.size} contacts`,
    );
    return limit === undefined
      ? this.addressBook.renderAll()
      : this.addressBook.renderFirst(limit);
  }
}
