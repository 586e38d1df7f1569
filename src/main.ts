import { NodeContext, NodeRuntime, NodeSocket } from "@effect/platform-node";
import { Cause, Effect, Layer, LogLevel, Runtime } from "effect";
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { randomUUID } from "node:crypto";
import { emitKeypressEvents } from "node:readline";
import { loadSimulatorConfig } from "./config.js";
import { createSimulatorLayers } from "./layers.js";
import { LoggingLayer } from "./logging.js";
import { TracingLayer } from "./tracing.js";
import { PileSimulator } from "./simulator.js";
import { PileDriver } from "./pile/pile-driver.js";
import { SimulatedClock } from "./simulated-clock.js";
import { Transport } from "./transport/types.js";

const isProd = process.env.NODE_ENV == 'production';

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const TracingLive = TracingLayer(new SentrySpanProcessor());

type Keypress = { name?: string; ctrl?: boolean };

// `p` simulates a pile breakdown; raw mode swallows Ctrl+C so it is re-raised as SIGINT
const listenForBreakdownKey = (simulator: PileSimulator) => Effect.gen(function* () {
  const runtime = yield* Effect.runtime<never>();
  const stdin = process.stdin;

  const onKeypress = (_: string | undefined, key: Keypress | undefined) => {
    if (key?.ctrl && key.name === 'c') {
      process.kill(process.pid, 'SIGINT');
      return;
    }

    if (key?.name === 'p') {
      Runtime.runFork(runtime)(
        Effect.log('Breakdown key pressed').pipe(Effect.zipRight(simulator.interrupt()))
      );
    }
  };

  yield* Effect.acquireRelease(
    Effect.sync(() => {
      emitKeypressEvents(stdin);
      stdin.setRawMode(true);
      stdin.on('keypress', onKeypress);
    }),
    () => Effect.sync(() => {
      stdin.off('keypress', onKeypress);
      stdin.setRawMode(false);
      stdin.pause();
    })
  );

  yield* Effect.log("Press 'p' to simulate a pile breakdown");
});

const program = Effect.gen(function* () {
  const config = yield* loadSimulatorConfig;
  const pileId = randomUUID();

  yield* Effect.gen(function* () {
    const simulator = new PileSimulator(
      yield* Transport,
      yield* PileDriver,
      yield* SimulatedClock,
    );

    if (config.pile.allowInterruption && process.stdin.isTTY) {
      yield* listenForBreakdownKey(simulator);
    }

    yield* simulator.start();
  }).pipe(
    Effect.provide(
      createSimulatorLayers(config, pileId).pipe(
        Layer.provide(Layer.mergeAll(NodeContext.layer, NodeSocket.layerWebSocketConstructor))
      )
    ),
  );
}).pipe(
  Effect.tapErrorCause((cause) => Cause.isInterruptedOnly(cause)
    ? Effect.void
    : Effect.sync(() => Sentry.captureException(Cause.squash(cause)))),
  Effect.scoped,
  Effect.provide(TracingLive),
  Effect.provide(
    LoggingLayer({ directory: "logs", consoleLevel: isProd ? LogLevel.Info : LogLevel.Debug }).pipe(
      Layer.provide(NodeContext.layer)
    )
  ),
);

NodeRuntime.runMain(program);

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});
