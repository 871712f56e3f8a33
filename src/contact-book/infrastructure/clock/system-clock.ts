import { Injectable } from '@nestjs/common';
import { DateTime } from 'luxon';
import { IClock } from '../../application/interfaces/clock.interface';

@Injectable()
export class SystemClock implements IClock {
  today(): DateTime {
    return DateTime.now();
  }
}
