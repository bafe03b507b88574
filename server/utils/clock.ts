import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { IsoDate } from '../../shared/lending-types';
import { toIsoDate } from '../domain/dates';

dayjs.extend(utc);

export interface Clock {
  today(): IsoDate;
  now(): Date;
}

export const systemClock: Clock = {
  today: () => toIsoDate(new Date()),
  now: () => new Date()
};

/**
 * Clock pinned to one calendar day, for tests and replays
 */
export function fixedClock(today: IsoDate): Clock {
  return {
    today: () => today,
    now: () => dayjs.utc(today).toDate()
  };
}
