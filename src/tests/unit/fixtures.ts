import { Either, Option } from 'effect';
import { makeTariffTable } from '../../tariff/tariff-table.js';
import type { PileConfig } from '../../pile/pile.js';
import type { PileEvent } from '../../events.js';
import type { ClockConfig } from '../../simulated-clock.js';

export const testTariff = Either.getOrThrow(makeTariffTable({
  periods: [
    { start: '00:00:00', end: '07:00:00', price: 0.4 },
    { start: '07:00:00', end: '10:00:00', price: 0.7 },
    { start: '10:00:00', end: '00:00:00', price: 1.0 },
  ],
  service_fee: 0.8,
}));

export const utc = (time: string) => new Date(`2024-01-01T${time}.000Z`);

// real and simulated time move together, starting at 06:30 UTC
export const testClockConfig: ClockConfig = {
  timeZone: 'UTC',
  speed: 1,
  startTime: Option.some(utc('06:30:00')),
  updateIntervalMs: 1000,
};

export const testPileConfig: PileConfig = {
  id: 'pile-1',
  chargeType: 'fast',
  powerKw: 30,
  queueCapacity: 2,
  allowInterruption: true,
};

export const isEvent = <T extends PileEvent['_tag']>(tag: T) =>
  (event: PileEvent): event is Extract<PileEvent, { _tag: T }> => event._tag === tag;
