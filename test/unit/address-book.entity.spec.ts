import { AddressBook } from '../../src/contact-book/domain/entities/address-book.entity';
import { ContactRecord } from '../../src/contact-book/domain/entities/contact-record.entity';
import { Name } from '../../src/contact-book/domain/value-objects/name.vo';
import { Phone } from '../../src/contact-book/domain/value-objects/phone.vo';
import { Birthday } from '../../src/contact-book/domain/value-objects/birthday.vo';

describe('AddressBook', () => {
  let book: AddressBook;

  const makeRecord = (
    name: string,
    phone = '1234567890',
    birthday?: string,
  ): ContactRecord =>
    new ContactRecord({
      name: new Name(name),
      phones: [new Phone(phone)],
      birthday: birthday ? new Birthday(birthday) : null,
    });

  const names = (records: Iterable<ContactRecord>): string[] =>
    Array.from(records, (r) => r.name.value);

  beforeEach(() => {
    book = new AddressBook();
  });

  describe('addRecord()', () => {
    it('should return the inserted record', () => {
      const alice = makeRecord('Alice');
      expect(book.addRecord(alice)).toBe(alice);
      expect(book.size).toBe(1);
    });

    it('should refuse a duplicate name and keep the original record', () => {
      const first = makeRecord('Alice', '1111111111');
      const second = makeRecord('Alice', '2222222222');

      book.addRecord(first);

      expect(book.addRecord(second)).toBeNull();
      expect(book.size).toBe(1);
      expect(book.get('Alice')).toBe(first);
    });

    it('should treat names as case-sensitive keys', () => {
      book.addRecord(makeRecord('Alice'));
      book.addRecord(makeRecord('alice'));

      expect(book.size).toBe(2);
    });
  });

  describe('deleteRecord()', () => {
    it('should remove and return the record', () => {
      const alice = makeRecord('Alice');
      book.addRecord(alice);

      expect(book.deleteRecord('Alice')).toBe(alice);
      expect(book.get('Alice')).toBeNull();
      expect(book.deleteRecord('Alice')).toBeNull();
    });
  });

  describe('get()', () => {
    it('should return null for an unknown name', () => {
      expect(book.get('Nobody')).toBeNull();
    });
  });

  describe('boundedIterate()', () => {
    beforeEach(() => {
      book.addRecord(makeRecord('Alice'));
      book.addRecord(makeRecord('Bob'));
      book.addRecord(makeRecord('Carol'));
    });

    it('should stop at the book size when asked for more', () => {
      expect(names(book.boundedIterate(10))).toEqual(['Alice', 'Bob', 'Carol']);
    });

    it('should yield the first n records in insertion order', () => {
      expect(names(book.boundedIterate(2))).toEqual(['Alice', 'Bob']);
    });

    it('should yield nothing for n = 0', () => {
      expect(names(book.boundedIterate(0))).toEqual([]);
    });

    it('should start over on every call and see later changes', () => {
      expect(names(book.boundedIterate(1))).toEqual(['Alice']);

      book.deleteRecord('Alice');

      expect(names(book.boundedIterate(1))).toEqual(['Bob']);
    });
  });

  describe('renderAll()', () => {
    it('should report an empty book', () => {
      expect(book.renderAll()).toBe('Contacts are empty');
    });

    it('should list every record under a title-cased name', () => {
      book.addRecord(makeRecord('alice', '1234567890'));
      book.addRecord(makeRecord('BOB', '0987654321', '05.03.1990'));

      expect(book.renderAll()).toBe(
        'Alice: 1234567890\nBob: 0987654321 Birthday: 05.03.1990',
      );
    });
  });

  describe('renderFirst()', () => {
    it('should list only the first n records', () => {
      book.addRecord(makeRecord('Alice', '1111111111'));
      book.addRecord(makeRecord('Bob', '2222222222'));

      expect(book.renderFirst(1)).toBe('Alice: 1111111111');
    });
  });
});
