import { DateTime } from 'luxon';
import { Name } from '../value-objects/name.vo';
import { Phone } from '../value-objects/phone.vo';
import { Birthday } from '../value-objects/birthday.vo';
import { NoBirthdayException } from '../exceptions/no-birthday.exception';

export class ContactRecord {
  readonly name: Name;
  private readonly _phones: Phone[] = [];
  private _birthday: Birthday | null = null;

  constructor(params: {
    name: Name;
    phones?: readonly Phone[];
    birthday?: Birthday | null;
  }) {
    this.name = params.name;
    for (const phone of params.phones ?? []) {
      this.addPhone(phone);
    }
    this.attachBirthday(params.birthday ?? null);
  }

  get phones(): readonly Phone[] {
    return this._phones;
  }

  get birthday(): Birthday | null {
    return this._birthday;
  }

  hasPhone(phone: Phone): boolean {
    return this._phones.some((p) => p.equals(phone));
  }

  addPhone(phone: Phone): boolean {
    if (this.hasPhone(phone)) {
      return false;
    }
    this._phones.push(phone);
    return true;
  }

  removePhone(phone: Phone): boolean {
    const index = this._phones.findIndex((p) => p.equals(phone));
    if (index === -1) {
      return false;
    }
    this._phones.splice(index, 1);
    return true;
  }

  /**
   * Replaces `oldPhone` with `newPhone`. Fails when `oldPhone` is absent.
   * If `newPhone` is already on the record it is not added a second time.
   */
  changePhone(oldPhone: Phone, newPhone: Phone): boolean {
    if (!this.removePhone(oldPhone)) {
      return false;
    }
    this.addPhone(newPhone);
    return true;
  }

  // null never clears an existing birthday
  attachBirthday(birthday: Birthday | null): void {
    if (birthday) {
      this._birthday = birthday;
    }
  }

  daysToBirthday(today: DateTime): number {
    if (!this._birthday) {
      throw new NoBirthdayException(this.name.value);
    }
    return this._birthday.daysUntilNext(today);
  }

  toString(): string {
    const phones =
      this._phones.length > 0
        ? this._phones.map((p) => p.value).join(', ')
        : 'no phones';
    return this._birthday
      ? `${phones} Birthday: ${this._birthday.toString()}`
      : phones;
  }
}
