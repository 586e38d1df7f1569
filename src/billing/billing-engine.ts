import type { DateTime } from "effect";
import { secondsOfDay } from "../simulated-clock.js";
import { priceAt, secondsUntilNextBoundary, type TariffTable } from "../tariff/tariff-table.js";
import { remainingEnergyKwh, type ChargingSession } from "../pile/charge-session.js";

const MS_PER_HOUR = 60 * 60 * 1000;

export type BillingContext = {
  readonly tariff: TariffTable;
  readonly timeZone: DateTime.TimeZone;
  readonly powerKw: number;
};

export type IntervalCharge = {
  readonly energyKwh: number;
  readonly chargeCost: number;
};

/**
 * Energy and tariff cost of drawing `powerKw` over `[from, to)`. The interval is cut at
 * every tariff boundary it crosses and each piece is priced at its own start.
 */
export const chargeForInterval = (context: BillingContext, from: Date, to: Date): IntervalCharge => {
  let cursor = from.getTime();
  const end = to.getTime();
  let energyKwh = 0;
  let chargeCost = 0;

  while (cursor < end) {
    const timeOfDay = secondsOfDay(new Date(cursor), context.timeZone);
    const untilBoundaryMs = Math.max(1, Math.round(secondsUntilNextBoundary(context.tariff, timeOfDay) * 1000));
    const pieceEnd = Math.min(end, cursor + untilBoundaryMs);
    const pieceEnergy = context.powerKw * ((pieceEnd - cursor) / MS_PER_HOUR);

    energyKwh += pieceEnergy;
    chargeCost += pieceEnergy * priceAt(context.tariff, timeOfDay);
    cursor = pieceEnd;
  }

  return { energyKwh, chargeCost };
};

/**
 * Bills `[lastBilledAt, until)` onto the session. Calling it again with the same
 * `until` (or an earlier one) leaves the session unchanged.
 */
export const bill = (session: ChargingSession, until: Date, context: BillingContext): ChargingSession => {
  if (until.getTime() <= session.lastBilledAt.getTime()) {
    return session;
  }

  const charge = chargeForInterval(context, session.lastBilledAt, until);
  const energyDeliveredKwh = session.energyDeliveredKwh + charge.energyKwh;

  return {
    ...session,
    energyDeliveredKwh,
    chargeCost: session.chargeCost + charge.chargeCost,
    serviceFee: energyDeliveredKwh * context.tariff.serviceFee,
    lastBilledAt: until,
  };
};

// simulated instant the requested energy is reached at constant power
export const completionInstant = (session: ChargingSession, powerKw: number): Date =>
  new Date(session.lastBilledAt.getTime() + Math.round((remainingEnergyKwh(session) / powerKw) * MS_PER_HOUR));
