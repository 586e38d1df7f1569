import { Schema } from "effect";

// "HH:MM:SS", 24-hour
export const TimeOfDaySchema = Schema.String.pipe(
  Schema.pattern(/^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/)
);

export const TariffPeriodSchema = Schema.Struct({
  start: TimeOfDaySchema,
  end: TimeOfDaySchema,
  price: Schema.Number,
});

export const PriceFileSchema = Schema.Struct({
  periods: Schema.Array(TariffPeriodSchema),
  service_fee: Schema.Number,
});

export type PriceFile = typeof PriceFileSchema.Type;
