import { DeleteContactUseCase } from '../../src/contact-book/application/use-cases/delete-contact.use-case';
import { AddressBook } from '../../src/contact-book/domain/entities/address-book.entity';
import { ContactRecord } from '../../src/contact-book/domain/entities/contact-record.entity';
import { Name } from '../../src/contact-book/domain/value-objects/name.vo';
import { Phone } from '../../src/contact-book/domain/value-objects/phone.vo';
import { ContactNotFoundException } from '../../src/contact-book/domain/exceptions/contact-not-found.exception';

describe('DeleteContactUseCase', () => {
  let useCase: DeleteContactUseCase;
  let book: AddressBook;
  let alice: ContactRecord;

  beforeEach(() => {
    book = new AddressBook();
    alice = new ContactRecord({
      name: new Name('Alice'),
      phones: [new Phone('1111111111')],
    });
    book.addRecord(alice);
    useCase = new DeleteContactUseCase(book);
  });

  it('should remove and return the record', () => {
    expect(useCase.execute('Alice')).toBe(alice);
    expect(book.get('Alice')).toBeNull();
    expect(book.size).toBe(0);
  });

  it('should throw ContactNotFoundException for an unknown contact', () => {
    expect(() => useCase.execute('Bob')).toThrow(
      "Contact with name 'Bob' not found in address book",
    );
    expect(() => useCase.execute('Bob')).toThrow(ContactNotFoundException);
    expect(book.size).toBe(1);
  });

  it('should throw on a second delete of the same contact', () => {
    useCase.execute('Alice');

    expect(() => useCase.execute('Alice')).toThrow(ContactNotFoundException);
  });
});
