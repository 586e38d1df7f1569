import { Effect, Option } from 'effect';
import { AdmissionQueue } from './admission-queue.js';
import * as Session from './charge-session.js';
import { bill, completionInstant, type BillingContext } from '../billing/billing-engine.js';
import { AdmissionRejectedError } from '../errors/admission-rejected.error.js';
import { InterruptionNotAllowedError } from '../errors/interruption-not-allowed.error.js';
import { formatInZone, type SimulatedClock } from '../simulated-clock.js';
import type { TariffTable } from '../tariff/tariff-table.js';
import type { PileEvent } from '../events.js';

export type PileConfig = {
  readonly id: string;
  readonly chargeType: Session.ChargeType;
  readonly powerKw: number;
  readonly queueCapacity: number;
  readonly allowInterruption: boolean;
};

/**
 * One simulated charging pile. Every operation reads the simulated clock once and
 * returns the events it caused, in the order the transitions happened. The pile is
 * not safe for concurrent use; `PileDriver` serialises all calls.
 */
export class Pile {
  private readonly queue: AdmissionQueue;
  private readonly billing: BillingContext;
  private closed = false;

  public constructor(
    public readonly config: PileConfig,
    tariff: TariffTable,
    private readonly clock: SimulatedClock,
  ) {
    this.queue = new AdmissionQueue(config.queueCapacity);
    this.billing = { tariff, timeZone: clock.timeZone, powerKw: config.powerKw };
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get activeSession(): Session.ChargingSession | null {
    return this.queue.activeSession;
  }

  public get waitingSessions(): readonly Session.QueuedSession[] {
    return this.queue.waitingSessions;
  }

  public submit(request: Session.ChargeRequest): Effect.Effect<PileEvent[], AdmissionRejectedError> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      if (deps.closed) {
        return yield* new AdmissionRejectedError({ requestId: request.id, reason: 'PileClosed' });
      }

      if (request.chargeType !== null && request.chargeType !== deps.config.chargeType) {
        return yield* new AdmissionRejectedError({ requestId: request.id, reason: 'ChargeTypeMismatch' });
      }

      const session = yield* deps.queue.enqueue(request);

      yield* Effect.log(`Request ${request.id} queued`, { queue_size: deps.queue.size });

      const events: PileEvent[] = [{ _tag: 'RequestQueued', session, at: now }];
      events.push(...(yield* deps.promote(now)));

      return events;
    }));
  }

  public tick(): Effect.Effect<PileEvent[]> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      const events: PileEvent[] = [];
      const active = deps.queue.activeSession;

      if (active) {
        const completesAt = completionInstant(active, deps.config.powerKw);
        const targetReached = now.getTime() >= completesAt.getTime();
        const billed = bill(active, targetReached ? completesAt : now, deps.billing);

        if (targetReached) {
          deps.queue.releaseActive();
          const finished = Session.complete(billed);
          events.push({ _tag: 'SessionCompleted', session: finished, at: now });

          yield* Effect.log(`Session ${finished.request.id} completed`, {
            energy_kwh: finished.energyDeliveredKwh,
            total_cost: Session.totalCost(finished),
          });
        } else if (billed !== active) {
          deps.queue.updateActive(billed);
          events.push({ _tag: 'SessionProgress', session: billed, at: now });

          yield* Effect.logDebug(`Session ${billed.request.id} billed`, {
            energy_kwh: billed.energyDeliveredKwh,
            charge_cost: billed.chargeCost,
          });
        }
      }

      events.push(...(yield* deps.promote(now)));

      return events;
    }));
  }

  /**
   * Cancelling a waiting request drops it without billing. Cancelling the active
   * session is an explicit stop: it is billed up to now and completed.
   */
  public cancel(requestId: number): Effect.Effect<PileEvent[]> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      const cancelled = deps.queue.cancelWaiting(requestId);
      if (Option.isSome(cancelled)) {
        yield* Effect.log(`Request ${requestId} cancelled`);

        const events: PileEvent[] = [{ _tag: 'RequestCancelled', session: cancelled.value, at: now }];
        return events;
      }

      if (deps.queue.activeSession?.request.id === requestId) {
        return yield* deps.stopActive(now);
      }

      yield* Effect.logWarning(`No request ${requestId} to cancel`);
      return [];
    }));
  }

  /**
   * Simulated hardware fault. Billing stops at the current instant; the freed slot is
   * filled on the next tick.
   */
  public interrupt(): Effect.Effect<PileEvent[], InterruptionNotAllowedError> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      if (!deps.config.allowInterruption) {
        return yield* new InterruptionNotAllowedError();
      }

      const active = deps.queue.activeSession;
      if (!active) {
        yield* Effect.log('Pile is idle, nothing to interrupt');
        return [];
      }

      deps.queue.releaseActive();
      const interrupted = Session.interrupt(bill(active, now, deps.billing));

      yield* Effect.logError(`Pile fault, session ${interrupted.request.id} interrupted`, {
        energy_kwh: interrupted.energyDeliveredKwh,
        total_cost: Session.totalCost(interrupted),
      });

      const events: PileEvent[] = [{ _tag: 'SessionInterrupted', session: interrupted, at: now }];
      return events;
    }));
  }

  public close(): Effect.Effect<PileEvent[]> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      if (deps.closed) {
        yield* Effect.logWarning('Pile is already closed');
        return [];
      }

      deps.closed = true;

      const events: PileEvent[] = [...(yield* deps.stopActive(now))];
      const dropped = deps.queue.drainWaiting();
      for (const session of dropped) {
        events.push({ _tag: 'RequestCancelled', session, at: now });
      }
      events.push({ _tag: 'PileClosed', at: now });

      yield* Effect.log('Pile closed', { dropped_requests: dropped.length });

      return events;
    }));
  }

  public open(): Effect.Effect<PileEvent[]> {
    const deps = this;

    return this.atNow((now) => Effect.gen(function* () {
      if (!deps.closed) {
        yield* Effect.logWarning('Pile is already open');
        return [];
      }

      deps.closed = false;
      yield* Effect.log('Pile opened');

      const events: PileEvent[] = [{ _tag: 'PileOpened', at: now }];
      return events;
    }));
  }

  private stopActive(now: Date): Effect.Effect<PileEvent[]> {
    const deps = this;

    return Effect.gen(function* () {
      const active = deps.queue.activeSession;
      if (!active) {
        return [];
      }

      deps.queue.releaseActive();
      const stopped = Session.complete(bill(active, now, deps.billing));

      yield* Effect.log(`Session ${stopped.request.id} stopped`, {
        energy_kwh: stopped.energyDeliveredKwh,
        total_cost: Session.totalCost(stopped),
      });

      const events: PileEvent[] = [{ _tag: 'SessionCompleted', session: stopped, at: now }];
      return events;
    });
  }

  private promote(now: Date): Effect.Effect<PileEvent[]> {
    const deps = this;

    return Effect.gen(function* () {
      const promoted = deps.queue.promote(now);
      if (Option.isNone(promoted)) {
        return [];
      }

      yield* Effect.log(`Session ${promoted.value.request.id} started charging`);

      const events: PileEvent[] = [{ _tag: 'SessionAdmitted', session: promoted.value, at: now }];
      return events;
    });
  }

  private atNow<A, E>(operation: (now: Date) => Effect.Effect<A, E>): Effect.Effect<A, E> {
    const timeZone = this.clock.timeZone;

    return this.clock.now.pipe(
      Effect.flatMap((now) => operation(now).pipe(
        Effect.annotateLogs('simulated_time', formatInZone(now, timeZone))
      ))
    );
  }
}
