import { Config as EffectConfig, Effect, Option } from "effect";
import { ConfigurationError } from "./errors/configuration.error.js";
import { validateClockConfig, type ClockConfig } from "./simulated-clock.js";
import type { ChargeType } from "./pile/charge-session.js";

export const AppConfig = {
  pricesPath: EffectConfig.string("PRICES_PATH").pipe(
    EffectConfig.withDefault("prices.json")
  ),

  pile: {
    chargeType: EffectConfig.literal("fast", "slow")("PILE_CHARGE_TYPE").pipe(
      EffectConfig.withDefault("fast")
    ),
    powerKw: EffectConfig.number("PILE_POWER_KW").pipe(
      EffectConfig.withDefault(30)
    ),
    queueCapacity: EffectConfig.integer("PILE_QUEUE_CAPACITY").pipe(
      EffectConfig.withDefault(2)
    ),
    allowInterruption: EffectConfig.boolean("PILE_ALLOW_INTERRUPTION").pipe(
      EffectConfig.withDefault(false)
    ),
  },

  websocketUrl: EffectConfig.string("WEBSOCKET_URL").pipe(
    EffectConfig.withDefault("ws://localhost:8080/ws")
  ),

  clock: {
    updateIntervalMs: EffectConfig.integer("CLOCK_UPDATE_INTERVAL_MS").pipe(
      EffectConfig.withDefault(5000)
    ),
    timeZone: EffectConfig.string("CLOCK_TIME_ZONE").pipe(
      EffectConfig.withDefault("Asia/Shanghai")
    ),
    speed: EffectConfig.number("CLOCK_SPEED").pipe(
      EffectConfig.withDefault(1)
    ),
    startTime: EffectConfig.option(EffectConfig.date("CLOCK_START_TIME")),
  },
};

export type SimulatorConfig = {
  readonly pricesPath: string;
  readonly websocketUrl: string;
  readonly pile: {
    readonly chargeType: ChargeType;
    readonly powerKw: number;
    readonly queueCapacity: number;
    readonly allowInterruption: boolean;
  };
  readonly clock: ClockConfig;
};

const check = (valid: boolean, message: string) =>
  valid ? Effect.void : Effect.fail(new ConfigurationError({ message }));

/**
 * Reads every setting from the environment into one fully-populated config.
 */
export const loadSimulatorConfig: Effect.Effect<SimulatorConfig, ConfigurationError> = Effect.gen(function* () {
  const config: SimulatorConfig = yield* EffectConfig.all({
    pricesPath: AppConfig.pricesPath,
    websocketUrl: AppConfig.websocketUrl,
    pile: EffectConfig.all(AppConfig.pile),
    clock: EffectConfig.all(AppConfig.clock),
  }).pipe(
    Effect.mapError((err) => new ConfigurationError({ message: `Invalid configuration: ${String(err)}`, cause: err }))
  );

  yield* check(Number.isFinite(config.pile.powerKw) && config.pile.powerKw > 0, `Pile power must be positive, got ${config.pile.powerKw}`);
  yield* check(config.pile.queueCapacity >= 1, `Queue capacity must be at least 1, got ${config.pile.queueCapacity}`);
  yield* validateClockConfig(config.clock);

  if (config.clock.updateIntervalMs < 100) {
    yield* Effect.logWarning(`Update interval of ${config.clock.updateIntervalMs}ms is very short and may flood the dispatch service`);
  }

  if (config.clock.speed > 1) {
    yield* Effect.logWarning(`Clock runs ${config.clock.speed}x faster than real time`);
  }

  yield* Effect.log('Configuration loaded', {
    prices_path: config.pricesPath,
    websocket_url: config.websocketUrl,
    charge_type: config.pile.chargeType,
    power_kw: config.pile.powerKw,
    queue_capacity: config.pile.queueCapacity,
    time_zone: config.clock.timeZone,
    start_time: Option.map(config.clock.startTime, (date) => date.toISOString()).pipe(Option.getOrNull),
  });

  return config;
});
