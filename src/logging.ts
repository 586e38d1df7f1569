import { DateTime, Effect, Layer, Logger, LogLevel } from "effect";
import { FileSystem, PlatformLogger } from "@effect/platform";
import { ConfigurationError } from "./errors/configuration.error.js";

export type LoggingOptions = {
  readonly directory: string;
  readonly consoleLevel: LogLevel.LogLevel;
};

/**
 * Console output at `consoleLevel` plus every log line, at any level, as JSON in
 * `<directory>/app.log.<YYYY-MM-DD>`, one file per day the process was started.
 */
export const LoggingLayer = (options: LoggingOptions) => Layer.merge(
  Logger.replaceScoped(
    Logger.defaultLogger,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      yield* fs.makeDirectory(options.directory, { recursive: true });

      const today = DateTime.formatIsoDateUtc(yield* DateTime.now);
      const fileLogger = yield* Logger.jsonLogger.pipe(
        PlatformLogger.toFile(`${options.directory}/app.log.${today}`)
      );
      const consoleLogger = Logger.filterLogLevel(
        Logger.defaultLogger,
        (level) => LogLevel.greaterThanEqual(level, options.consoleLevel)
      );

      return Logger.zip(consoleLogger, fileLogger);
    }).pipe(
      Effect.mapError((err) => new ConfigurationError({ message: `Cannot open log file in ${options.directory}: ${err.message}`, cause: err }))
    )
  ),
  Logger.minimumLogLevel(LogLevel.All),
);
