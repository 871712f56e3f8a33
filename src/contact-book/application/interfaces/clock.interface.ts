import { DateTime } from 'luxon';

/**
 * Source of "today" for birthday arithmetic.
 *
 * Abstract class rather than interface so it survives to runtime and can be
 * referenced next to its injection token.
 */
export abstract class IClock {
  abstract today(): DateTime;
}
