import { ContactRecord } from './contact-record.entity';

/**
 * In-memory store of contact records keyed by the exact name string.
 * Iteration follows insertion order.
 */
export class AddressBook {
  private readonly records = new Map<string, ContactRecord>();

  get size(): number {
    return this.records.size;
  }

  /** Returns null, and leaves the existing record untouched, on a duplicate name. */
  addRecord(record: ContactRecord): ContactRecord | null {
    const key = record.name.value;
    if (this.records.has(key)) {
      return null;
    }
    this.records.set(key, record);
    return record;
  }

  deleteRecord(name: string): ContactRecord | null {
    const record = this.records.get(name);
    if (!record) {
      return null;
    }
    this.records.delete(name);
    return record;
  }

  get(name: string): ContactRecord | null {
    return this.records.get(name) ?? null;
  }

  /**
   * Yields at most `n` records. Ends early, without error, once the book
   * runs out. Each call starts again from the first record.
   */
  *boundedIterate(n: number): Generator<ContactRecord, void, undefined> {
    let count = 0;
    for (const record of this.records.values()) {
      if (count >= n) {
        return;
      }
      yield record;
      count += 1;
    }
  }

  renderAll(): string {
    return AddressBook.render(this.records.values());
  }

  renderFirst(n: number): string {
    return AddressBook.render(this.boundedIterate(n));
  }

  private static render(records: Iterable<ContactRecord>): string {
    const lines: string[] = [];
    for (const record of records) {
      lines.push(`${record.name.toTitleCase()}: ${record.toString()}`);
    }
    return lines.length > 0 ? lines.join('\n') : 'Contacts are empty';
  }
}
