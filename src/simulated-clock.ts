import { Clock, Context, DateTime, Duration, Effect, Layer, Option } from 'effect';
import { ConfigurationError } from './errors/configuration.error.js';

export type ClockConfig = {
  readonly timeZone: string;
  readonly speed: number;
  readonly startTime: Option.Option<Date>;
  readonly updateIntervalMs: number; // real milliseconds, independent of speed
};

export type SimulatedClock = {
  readonly now: Effect.Effect<Date>;
  readonly timeZone: DateTime.TimeZone;
  readonly speed: number;
  readonly tickInterval: Duration.Duration;
  /** Simulated time that elapses between two consecutive ticks. */
  readonly advancePerTick: Duration.Duration;
};

export const SimulatedClock = Context.GenericTag<SimulatedClock>('@pile-simulator/SimulatedClock');

/**
 * Checks speed, interval, zone and start instant, and resolves the zone. Shared by
 * the configuration loader so bad settings are reported before anything starts.
 */
export const validateClockConfig = (config: ClockConfig): Effect.Effect<DateTime.TimeZone, ConfigurationError> =>
  Effect.gen(function* () {
    if (!Number.isFinite(config.speed) || config.speed < 1) {
      return yield* new ConfigurationError({
        message: `Clock speed must be a finite number >= 1, got ${config.speed}`,
      });
    }

    if (!Number.isInteger(config.updateIntervalMs) || config.updateIntervalMs < 1) {
      return yield* new ConfigurationError({
        message: `Update interval must be a positive whole number of milliseconds, got ${config.updateIntervalMs}`,
      });
    }

    const timeZone = DateTime.zoneMakeNamed(config.timeZone);
    if (Option.isNone(timeZone)) {
      return yield* new ConfigurationError({ message: `Unsupported time zone: ${config.timeZone}` });
    }

    const startTime = Option.getOrUndefined(config.startTime);
    if (startTime !== undefined && Number.isNaN(startTime.getTime())) {
      return yield* new ConfigurationError({ message: 'Clock start time is not a valid instant' });
    }

    return timeZone.value;
  });

/**
 * The simulated instant is `start + realElapsed * speed`, where real time is read from
 * the Effect `Clock` so tests can drive it with `TestClock`.
 */
export const makeSimulatedClock = (config: ClockConfig): Effect.Effect<SimulatedClock, ConfigurationError> =>
  Effect.gen(function* () {
    const timeZone = yield* validateClockConfig(config);
    const startTime = Option.getOrUndefined(config.startTime);

    const realStartMs = yield* Clock.currentTimeMillis;
    const simulatedStartMs = startTime?.getTime() ?? realStartMs;
    const speed = config.speed;

    return {
      now: Clock.currentTimeMillis.pipe(
        Effect.map((realNowMs) => new Date(simulatedStartMs + (realNowMs - realStartMs) * speed))
      ),
      timeZone,
      speed,
      tickInterval: Duration.millis(config.updateIntervalMs),
      advancePerTick: Duration.millis(config.updateIntervalMs * speed),
    };
  });

export const SimulatedClockLayer = (config: ClockConfig) => Layer.effect(SimulatedClock, makeSimulatedClock(config));

// wall-clock time of day in the given zone, in fractional seconds
export const secondsOfDay = (instant: Date, zone: DateTime.TimeZone): number => {
  const parts = DateTime.toParts(DateTime.unsafeMakeZoned(instant, { timeZone: zone }));

  return parts.hours * 3600 + parts.minutes * 60 + parts.seconds + parts.millis / 1000;
};

export const formatInZone = (instant: Date, zone: DateTime.TimeZone): string =>
  DateTime.formatIsoOffset(DateTime.unsafeMakeZoned(instant, { timeZone: zone }));
