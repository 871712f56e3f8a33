import { DateTime } from 'luxon';
import { ValidationErrorKind } from '../enums/validation-error-kind.enum';
import { ValidationException } from '../exceptions/validation.exception';

const BIRTHDAY_FORMAT = 'dd.MM.yyyy';

/**
 * Birthday value object
 * A calendar date parsed from DD.MM.YYYY. Only the date matters; the time
 * of day and zone of the reference date are ignored when counting.
 */
export class Birthday {
  private readonly value: DateTime;

  constructor(value: string) {
    if (!Birthday.isValid(value)) {
      throw new ValidationException(
        ValidationErrorKind.INVALID_BIRTHDAY,
        'Birthday must contain date in format DD.MM.YYYY',
      );
    }
    this.value = DateTime.fromFormat(value, BIRTHDAY_FORMAT);
  }

  static isValid(value: string): boolean {
    const parsed = DateTime.fromFormat(value, BIRTHDAY_FORMAT);
    return parsed.isValid && parsed.year >= 1;
  }

  get day(): number {
    return this.value.day;
  }

  get month(): number {
    return this.value.month;
  }

  get year(): number {
    return this.value.year;
  }

  /**
   * Next occurrence on or after `referenceDate`, at the start of that day.
   * A 29 February birthday falls on 1 March in non-leap years.
   */
  nextOccurrence(referenceDate: DateTime): DateTime {
    const today = referenceDate.startOf('day');
    const thisYear = this.occurrenceIn(today.year, today);
    return thisYear < today ? this.occurrenceIn(today.year + 1, today) : thisYear;
  }

  /** Whole days from `referenceDate` to the next occurrence; 0 on the day itself. */
  daysUntilNext(referenceDate: DateTime): number {
    const today = referenceDate.startOf('day');
    return this.nextOccurrence(today).diff(today, 'days').days;
  }

  private occurrenceIn(year: number, reference: DateTime): DateTime {
    const occurrence = DateTime.fromObject(
      { year, month: this.month, day: this.day },
      { zone: reference.zone },
    );
    if (occurrence.isValid) {
      return occurrence;
    }
    return DateTime.fromObject(
      { year, month: 3, day: 1 },
      { zone: reference.zone },
    );
  }

  toString(): string {
    return this.value.toFormat(BIRTHDAY_FORMAT);
  }
}
