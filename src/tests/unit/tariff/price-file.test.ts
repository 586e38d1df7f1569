import { describe, it, expect } from '@effect/vitest';
import { Effect } from 'effect';
import { FileSystem } from '@effect/platform';
import { NodeFileSystem } from '@effect/platform-node';
import { DEFAULT_PRICE_FILE, loadTariffTable } from '../../../tariff/price-file.js';
import { priceAt } from '../../../tariff/tariff-table.js';

describe('loadTariffTable', () => {
  const withTempDir = <A, E>(test: (dir: string, fs: FileSystem.FileSystem) => Effect.Effect<A, E, FileSystem.FileSystem>) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const dir = yield* fs.makeTempDirectoryScoped();

      return yield* test(dir, fs);
    }).pipe(Effect.provide(NodeFileSystem.layer));

  it.scoped('should write and use the default tariff when the file is missing', () => withTempDir((dir, fs) => Effect.gen(function* () {
    const path = `${dir}/prices.json`;

    const table = yield* loadTariffTable(path);

    expect(table.serviceFee).toBe(0.8);
    expect(table.segments).toHaveLength(7);
    expect(priceAt(table, 12 * 3600)).toBe(1.0);

    const written: unknown = JSON.parse(yield* fs.readFileString(path));
    expect(written).toEqual(DEFAULT_PRICE_FILE);
  })));

  it.scoped('should load a valid price file', () => withTempDir((dir, fs) => Effect.gen(function* () {
    const path = `${dir}/prices.json`;
    yield* fs.writeFileString(path, JSON.stringify({
      periods: [
        { start: '00:00:00', end: '12:00:00', price: 0.5 },
        { start: '12:00:00', end: '00:00:00', price: 1.5 },
      ],
      service_fee: 0.2,
    }));

    const table = yield* loadTariffTable(path);

    expect(table.serviceFee).toBe(0.2);
    expect(priceAt(table, 11 * 3600)).toBe(0.5);
    expect(priceAt(table, 13 * 3600)).toBe(1.5);
  })));

  it.scoped('should fail on malformed JSON without overwriting the file', () => withTempDir((dir, fs) => Effect.gen(function* () {
    const path = `${dir}/prices.json`;
    yield* fs.writeFileString(path, 'not json');

    const error = yield* loadTariffTable(path).pipe(Effect.flip);

    expect(error._tag).toBe('ConfigurationError');
    expect(error.message.startsWith(`Malformed price file ${path}:`)).toBe(true);
    expect(yield* fs.readFileString(path)).toBe('not json');
  })));

  it.scoped('should fail on a time that is not HH:MM:SS', () => withTempDir((dir, fs) => Effect.gen(function* () {
    const path = `${dir}/prices.json`;
    yield* fs.writeFileString(path, JSON.stringify({
      periods: [{ start: '00:00:00', end: '25:00:00', price: 0.5 }],
      service_fee: 0.2,
    }));

    const error = yield* loadTariffTable(path).pipe(Effect.flip);

    expect(error.message.startsWith(`Malformed price file ${path}:`)).toBe(true);
  })));

  it.scoped('should fail on a price file that leaves part of the day unpriced', () => withTempDir((dir, fs) => Effect.gen(function* () {
    const path = `${dir}/prices.json`;
    yield* fs.writeFileString(path, JSON.stringify({
      periods: [{ start: '00:00:00', end: '12:00:00', price: 0.5 }],
      service_fee: 0.2,
    }));

    const error = yield* loadTariffTable(path).pipe(Effect.flip);

    expect(error.message).toBe('Invalid tariff: no price between 12:00:00 and 24:00:00');
  })));
});
