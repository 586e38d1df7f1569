import { Context, Effect, Layer, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import { ConfigurationError } from "../errors/configuration.error.js";
import { PriceFileSchema, type PriceFile } from "./schema.js";
import { makeTariffTable, type TariffTable } from "./tariff-table.js";

export const DEFAULT_PRICE_FILE: PriceFile = {
  periods: [
    { start: "00:00:00", end: "07:00:00", price: 0.4 },
    { start: "07:00:00", end: "10:00:00", price: 0.7 },
    { start: "10:00:00", end: "15:00:00", price: 1.0 },
    { start: "15:00:00", end: "18:00:00", price: 0.7 },
    { start: "18:00:00", end: "21:00:00", price: 1.0 },
    { start: "21:00:00", end: "23:00:00", price: 0.7 },
    { start: "23:00:00", end: "00:00:00", price: 0.4 },
  ],
  service_fee: 0.8,
};

export class Tariff extends Context.Tag("Tariff")<Tariff, TariffTable>() {}

/**
 * Reads and validates the price file. A missing file is replaced by the default
 * tariff, written back to `path` so it can be edited; an invalid one is never touched.
 */
export const loadTariffTable = (
  path: string
): Effect.Effect<TariffTable, ConfigurationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    if (!(yield* fs.exists(path))) {
      yield* Effect.logWarning(`Price file ${path} not found, using the default tariff`);
      yield* fs.writeFileString(path, JSON.stringify(DEFAULT_PRICE_FILE, null, 2)).pipe(
        Effect.tap(() => Effect.log(`Default tariff written to ${path}`)),
        Effect.catchAll((err) => Effect.logWarning(`Could not write default tariff to ${path}: ${err.message}`))
      );

      return yield* makeTariffTable(DEFAULT_PRICE_FILE);
    }

    const content = yield* fs.readFileString(path);
    const priceFile = yield* Schema.decodeUnknown(Schema.parseJson(PriceFileSchema))(content);

    return yield* makeTariffTable(priceFile);
  }).pipe(
    Effect.catchTags({
      SystemError: (err) => Effect.fail(new ConfigurationError({ message: `Cannot read price file ${path}: ${err.message}`, cause: err })),
      BadArgument: (err) => Effect.fail(new ConfigurationError({ message: `Cannot read price file ${path}: ${err.message}`, cause: err })),
      ParseError: (err) => Effect.fail(new ConfigurationError({ message: `Malformed price file ${path}: ${err.message}`, cause: err })),
    })
  );

export const TariffLayer = (path: string) => Layer.effect(Tariff, loadTariffTable(path));
