import { describe, it, expect } from '@effect/vitest';
import { DateTime } from 'effect';
import { bill, chargeForInterval, completionInstant, type BillingContext } from '../../../billing/billing-engine.js';
import { queued, startCharging, type ChargingSession } from '../../../pile/charge-session.js';
import { testTariff, utc } from '../fixtures.js';

const context: BillingContext = {
  tariff: testTariff,
  timeZone: DateTime.zoneUnsafeMakeNamed('UTC'),
  powerKw: 30,
};

const sessionStartedAt = (time: string, requestedEnergyKwh = 100): ChargingSession => startCharging(
  queued({ id: 1, chargeType: 'fast', requestedEnergyKwh, arrivedAt: utc(time) }),
  utc(time),
);

describe('BillingEngine', () => {
  it('should price each part of an interval at the period it falls in', () => {
    const billed = bill(sessionStartedAt('06:30:00'), utc('07:30:00'), context);

    expect(billed.energyDeliveredKwh).toBeCloseTo(30, 9);
    expect(billed.chargeCost).toBeCloseTo(16.5, 9);
    expect(billed.serviceFee).toBeCloseTo(24, 9);
    expect(billed.lastBilledAt).toEqual(utc('07:30:00'));
  });

  it('should give the same total when billed in several steps', () => {
    const start = sessionStartedAt('06:30:00');
    const once = bill(start, utc('07:30:00'), context);
    const stepwise = [utc('06:45:00'), utc('07:00:00'), utc('07:10:00'), utc('07:30:00')]
      .reduce((session, until) => bill(session, until, context), start);

    expect(stepwise.energyDeliveredKwh).toBeCloseTo(once.energyDeliveredKwh, 9);
    expect(stepwise.chargeCost).toBeCloseTo(once.chargeCost, 9);
    expect(stepwise.serviceFee).toBeCloseTo(once.serviceFee, 9);
  });

  it('should leave the session untouched when billed again up to the same instant', () => {
    const billed = bill(sessionStartedAt('06:30:00'), utc('07:30:00'), context);

    expect(bill(billed, utc('07:30:00'), context)).toBe(billed);
    expect(bill(billed, utc('07:00:00'), context)).toBe(billed);
  });

  it('should cross midnight', () => {
    const charge = chargeForInterval(context, new Date('2024-01-01T23:30:00.000Z'), new Date('2024-01-02T00:30:00.000Z'));

    expect(charge.energyKwh).toBeCloseTo(30, 9);
    expect(charge.chargeCost).toBeCloseTo(15 * 1.0 + 15 * 0.4, 9);
  });

  it('should use the wall-clock time of the configured zone', () => {
    // 22:30 UTC is 06:30 in Shanghai
    const shanghai = { ...context, timeZone: DateTime.zoneUnsafeMakeNamed('Asia/Shanghai') };
    const charge = chargeForInterval(shanghai, utc('22:30:00'), utc('23:30:00'));

    expect(charge.chargeCost).toBeCloseTo(16.5, 9);
  });

  it('should return nothing for an empty interval', () => {
    expect(chargeForInterval(context, utc('08:00:00'), utc('08:00:00'))).toEqual({ energyKwh: 0, chargeCost: 0 });
  });

  it('should find the instant the requested energy is reached', () => {
    const session = sessionStartedAt('06:30:00', 10);

    expect(completionInstant(session, 30)).toEqual(utc('06:50:00'));

    const halfway = bill(session, utc('06:40:00'), context);
    expect(completionInstant(halfway, 30)).toEqual(utc('06:50:00'));
  });
});
