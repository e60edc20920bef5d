import {
  differenceInBusinessDays,
  differenceInCalendarDays,
  format,
  isValid,
  isWeekend,
  parseISO,
} from 'date-fns';
import type { IsoDate } from '../types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && isValid(parseISO(value));
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function todayIso(): IsoDate {
  return toIsoDate(new Date());
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** Mon-Fri days from `from` to `to`. */
export function tradingDaysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInBusinessDays(parseISO(to), parseISO(from));
}

export function isTradingDay(date: IsoDate): boolean {
  return !isWeekend(parseISO(date));
}
