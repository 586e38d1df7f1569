import { Context, Effect, Layer, PubSub, Queue, Schedule } from 'effect';
import { Pile, type PileConfig } from './pile.js';
import type { ChargeRequest } from './charge-session.js';
import { SimulatedClock } from '../simulated-clock.js';
import { Tariff } from '../tariff/price-file.js';
import type { PileEvent } from '../events.js';

export type PileCommand =
  | { readonly _tag: 'Tick' }
  | { readonly _tag: 'Submit'; readonly request: ChargeRequest }
  | { readonly _tag: 'Cancel'; readonly requestId: number }
  | { readonly _tag: 'Interrupt' }
  | { readonly _tag: 'Close' }
  | { readonly _tag: 'Open' };

export type PileDriver = {
  readonly pile: Pile;
  readonly send: (command: PileCommand) => Effect.Effect<void>;
  // runs until interrupted; publishes every resulting event, in order, to `events`
  readonly start: (events: PubSub.PubSub<PileEvent>) => Effect.Effect<never>;
};

export const PileDriver = Context.GenericTag<PileDriver>('@pile-simulator/PileDriver');

export const makePileDriver = (config: PileConfig) => Effect.gen(function* () {
  const clock = yield* SimulatedClock;
  const tariff = yield* Tariff;
  const pile = new Pile(config, tariff, clock);

  // single consumer: timer ticks and inbound requests are applied one at a time, in arrival order
  const commands = yield* Queue.unbounded<PileCommand>();

  const apply = (command: PileCommand): Effect.Effect<PileEvent[]> => {
    switch (command._tag) {
      case 'Tick':
        return pile.tick();
      case 'Submit':
        return pile.submit(command.request).pipe(
          Effect.catchTag('AdmissionRejected', (err) => Effect.gen(function* () {
            yield* Effect.logWarning(`Request ${err.requestId} rejected: ${err.reason}`);
            const rejected: PileEvent[] = [{ _tag: 'RequestRejected', requestId: err.requestId, reason: err.reason, at: yield* clock.now }];
            return rejected;
          })),
          Effect.annotateLogs('request_id', command.request.id)
        );
      case 'Cancel':
        return pile.cancel(command.requestId).pipe(
          Effect.annotateLogs('request_id', command.requestId)
        );
      case 'Interrupt':
        return pile.interrupt().pipe(
          Effect.catchTag('InterruptionNotAllowed', (err) => Effect.logWarning(err.message).pipe(Effect.as([])))
        );
      case 'Close':
        return pile.close();
      case 'Open':
        return pile.open();
    }
  };

  const start = (events: PubSub.PubSub<PileEvent>): Effect.Effect<never> => Effect.gen(function* () {
    yield* Queue.offer(commands, { _tag: 'Tick' }).pipe(
      Effect.repeat(Schedule.fixed(clock.tickInterval)),
      Effect.forkScoped
    );

    return yield* Effect.forever(
      Queue.take(commands).pipe(
        Effect.flatMap((command) => apply(command).pipe(
          Effect.withSpan(`PileDriver.${command._tag}`)
        )),
        Effect.flatMap((produced) => PubSub.publishAll(events, produced))
      )
    );
  }).pipe(Effect.scoped);

  return {
    pile,
    send: (command: PileCommand) => Queue.offer(commands, command).pipe(Effect.asVoid),
    start,
  } satisfies PileDriver;
});

export const PileDriverLayer = (config: PileConfig) => Layer.effect(PileDriver, makePileDriver(config));
