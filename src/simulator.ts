import { Effect, Either, PubSub, Queue } from 'effect';
import type { ITransport } from './transport/types.js';
import type { TransportError } from './errors/transport.error.js';
import type { PileDriver } from './pile/pile-driver.js';
import type { SimulatedClock } from './simulated-clock.js';
import type { IEventLogger } from './event-logger/types.js';
import type { PileEvent } from './events.js';
import { EventLogger } from './event-logger/index.js';
import { decodeInbound, encodeEvent, encodeRegister } from './protocol/protocol-adapter.js';

enum SimulatorStatus {
  Pending,
  Running,
  Stopped,
}

export class PileSimulator {
  private status: SimulatorStatus = SimulatorStatus.Pending;

  public constructor(
    private readonly transport: ITransport,
    private readonly driver: PileDriver,
    private readonly clock: SimulatedClock,
    private readonly eventLogger: IEventLogger = new EventLogger(clock.timeZone),
  ) { }

  /**
   * Registers the pile and runs until the connection to the dispatch service ends.
   * Ticks, inbound requests and outbound updates all run concurrently.
   */
  public start(): Effect.Effect<void, TransportError> {
    this.status = SimulatorStatus.Running;
    const deps = this;

    return Effect.gen(function* () {
      const events = yield* PubSub.unbounded<PileEvent>();
      // subscribe before the driver starts so the first events are not missed
      const subscription = yield* PubSub.subscribe(events);

      yield* Effect.log('Registering pile', {
        pile_id: deps.driver.pile.config.id,
        charge_type: deps.driver.pile.config.chargeType,
      });
      yield* deps.transport.send(encodeRegister(deps.driver.pile.config, yield* deps.clock.now));

      const forward = Effect.forever(
        Queue.take(subscription).pipe(
          Effect.tap((event) => deps.eventLogger.onEvent(event)),
          Effect.flatMap((event) => deps.transport.send(encodeEvent(event, deps.driver.pile.config)))
        )
      );

      yield* Effect.raceFirst(
        deps.transport.run((message) => deps.handleInbound(message)),
        Effect.all([deps.driver.start(events), forward], { concurrency: 'unbounded', discard: true }),
      ).pipe(
        Effect.onInterrupt(() => deps.stop())
      );
    }).pipe(
      Effect.scoped,
      Effect.ensuring(Effect.sync(() => {
        deps.status = SimulatorStatus.Stopped;
      })),
    );
  }

  // simulated hardware fault, applied in order with every other command
  public interrupt(): Effect.Effect<void> {
    return this.driver.send({ _tag: 'Interrupt' });
  }

  /**
   * Shutdown while the connection is still open: the pile is closed so the active
   * session is billed up to now, and the resulting events are reported. Runs after
   * the driver has stopped, so it is the only caller touching the pile.
   */
  private stop(): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      if (deps.status !== SimulatorStatus.Running) {
        return;
      }
      deps.status = SimulatorStatus.Stopped;

      const active = deps.driver.pile.activeSession;
      yield* Effect.log('Stopping simulator', {
        active_request: active?.request.id ?? null,
        waiting_requests: deps.driver.pile.waitingSessions.length,
      });

      const events = yield* deps.driver.pile.close();

      for (const event of events) {
        yield* deps.eventLogger.onEvent(event);
        yield* deps.transport.send(encodeEvent(event, deps.driver.pile.config));
      }
    }).pipe(
      Effect.catchTag('TransportError', (err) => Effect.logWarning(`Could not report shutdown: ${err.message}`)),
      Effect.withSpan('PileSimulator.stop')
    );
  }

  private handleInbound(message: string): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      const decoded = decodeInbound(message, yield* deps.clock.now);

      if (Either.isLeft(decoded)) {
        yield* Effect.logWarning(decoded.left.message, { raw: decoded.left.raw });
        return;
      }

      yield* Effect.logDebug(`Received ${decoded.right._tag} command`);
      yield* deps.driver.send(decoded.right);
    });
  }
}
