export type ChargeType = 'fast' | 'slow';

export type ChargeRequest = {
  readonly id: number;
  readonly chargeType: ChargeType | null; // null when the dispatcher does not say
  readonly requestedEnergyKwh: number;
  readonly arrivedAt: Date; // simulated instant the request was received
};

export type Metering = {
  readonly energyDeliveredKwh: number;
  readonly chargeCost: number; // tariff part only
  readonly serviceFee: number;
  readonly lastBilledAt: Date;
};

export type QueuedSession = {
  readonly status: 'Queued';
  readonly request: ChargeRequest;
};

export type ChargingSession = Metering & {
  readonly status: 'Charging';
  readonly request: ChargeRequest;
  readonly startedAt: Date;
};

export type FinishedSession = Metering & {
  readonly status: 'Completed' | 'Interrupted';
  readonly request: ChargeRequest;
  readonly startedAt: Date;
  readonly endedAt: Date;
};

export type ChargeSession = QueuedSession | ChargingSession | FinishedSession;

export const queued = (request: ChargeRequest): QueuedSession => ({ status: 'Queued', request });

export const startCharging = (session: QueuedSession, at: Date): ChargingSession => ({
  status: 'Charging',
  request: session.request,
  startedAt: at,
  lastBilledAt: at,
  energyDeliveredKwh: 0,
  chargeCost: 0,
  serviceFee: 0,
});

// Both terminal transitions freeze metering at the last billed instant; bill up to the
// stop instant before calling them.
export const complete = (session: ChargingSession): FinishedSession => ({
  ...session,
  status: 'Completed',
  endedAt: session.lastBilledAt,
});

export const interrupt = (session: ChargingSession): FinishedSession => ({
  ...session,
  status: 'Interrupted',
  endedAt: session.lastBilledAt,
});

export const totalCost = (metering: Metering): number => metering.chargeCost + metering.serviceFee;

export const remainingEnergyKwh = (session: ChargingSession): number =>
  Math.max(0, session.request.requestedEnergyKwh - session.energyDeliveredKwh);
