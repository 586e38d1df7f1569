import { Either } from "effect";
import { ConfigurationError } from "../errors/configuration.error.js";
import type { PriceFile } from "./schema.js";

export const SECONDS_PER_DAY = 24 * 60 * 60;

export type TariffPeriod = {
  readonly start: number; // seconds of day, inclusive
  readonly end: number; // seconds of day, exclusive; may be < start for the one period wrapping midnight
  readonly price: number;
};

export type TariffTable = {
  readonly periods: readonly TariffPeriod[];
  // periods split at midnight and sorted; they tile [0, SECONDS_PER_DAY) exactly
  readonly segments: readonly TariffPeriod[];
  readonly serviceFee: number;
};

export const parseTimeOfDay = (value: string): number => {
  const [hours = 0, minutes = 0, seconds = 0] = value.split(':').map(Number);

  return hours * 3600 + minutes * 60 + seconds;
};

export const formatTimeOfDay = (seconds: number): string => {
  const whole = Math.floor(seconds) % SECONDS_PER_DAY;
  const pad = (n: number) => n.toString().padStart(2, '0');

  return `${pad(Math.floor(whole / 3600))}:${pad(Math.floor((whole % 3600) / 60))}:${pad(whole % 60)}`;
};

const fail = (message: string) => Either.left(new ConfigurationError({ message: `Invalid tariff: ${message}` }));

/**
 * Builds a tariff from a decoded price file. The periods must partition the day:
 * an end of 00:00:00 stands for midnight at the end of the day, and at most one
 * period may wrap past midnight.
 */
export const makeTariffTable = (priceFile: PriceFile): Either.Either<TariffTable, ConfigurationError> => {
  if (!Number.isFinite(priceFile.service_fee) || priceFile.service_fee < 0) {
    return fail(`service fee must be a non-negative number, got ${priceFile.service_fee}`);
  }

  const periods: TariffPeriod[] = [];
  for (const period of priceFile.periods) {
    const start = parseTimeOfDay(period.start);
    const endOfDay = parseTimeOfDay(period.end);
    const end = endOfDay === 0 ? SECONDS_PER_DAY : endOfDay;

    if (!Number.isFinite(period.price) || period.price < 0) {
      return fail(`price of ${period.start}-${period.end} must be a non-negative number`);
    }
    if (start === end) {
      return fail(`period ${period.start}-${period.end} is empty`);
    }

    periods.push({ start, end, price: period.price });
  }

  const wrapping = periods.filter((period) => period.end < period.start);
  if (wrapping.length > 1) {
    return fail(`${wrapping.length} periods cross midnight, at most one may`);
  }

  const segments = periods
    .flatMap((period) => period.end < period.start
      ? [
        { start: period.start, end: SECONDS_PER_DAY, price: period.price },
        { start: 0, end: period.end, price: period.price },
      ]
      : [period])
    .sort((a, b) => a.start - b.start);

  let covered = 0;
  for (const segment of segments) {
    if (segment.start > covered) {
      return fail(`no price between ${formatTimeOfDay(covered)} and ${formatTimeOfDay(segment.start)}`);
    }
    if (segment.start < covered) {
      return fail(`periods overlap at ${formatTimeOfDay(segment.start)}`);
    }
    covered = segment.end;
  }

  if (covered !== SECONDS_PER_DAY) {
    return fail(`no price between ${formatTimeOfDay(covered)} and 24:00:00`);
  }

  return Either.right({ periods, segments, serviceFee: priceFile.service_fee });
};

const segmentIndexAt = (table: TariffTable, secondsOfDay: number): number => {
  let low = 0;
  let high = table.segments.length - 1;

  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (table.segments[mid].start <= secondsOfDay) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }

  return low;
};

export const priceAt = (table: TariffTable, secondsOfDay: number): number =>
  table.segments[segmentIndexAt(table, secondsOfDay)].price;

// seconds from `secondsOfDay` to the start of the next segment (midnight counts as a boundary)
export const secondsUntilNextBoundary = (table: TariffTable, secondsOfDay: number): number =>
  table.segments[segmentIndexAt(table, secondsOfDay)].end - secondsOfDay;
