import { Schema } from "effect";

export const MessageTypeSchema = Schema.Literal(
  "register",
  "update",
  "complete",
  "fault",
  "new",
  "cancel",
  "close",
  "open",
  "reject",
);

export type MessageType = typeof MessageTypeSchema.Type;

// every message is `{ type, data }` where `data` is itself a JSON document; outbound
// messages also carry `at`, the simulated instant the pile observed the change
export const EnvelopeSchema = Schema.Struct({
  type: MessageTypeSchema,
  data: Schema.optional(Schema.String),
  at: Schema.optional(Schema.String),
});

export type Envelope = typeof EnvelopeSchema.Type;

export const WireChargeTypeSchema = Schema.Literal("F", "T");

export const DetailStatusSchema = Schema.Literal("waiting", "charging", "completed", "interrupted");

export const ChargingDetailSchema = Schema.Struct({
  id: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  request_amount: Schema.Number.pipe(Schema.positive()),
  already_charged: Schema.Number,
  start_time: Schema.NullOr(Schema.String),
  last_update_time: Schema.NullOr(Schema.String),
  end_time: Schema.NullOr(Schema.String),
  charge_cost: Schema.Number,
  service_fee: Schema.Number,
  total_cost: Schema.Number,
  status: DetailStatusSchema,
  type: Schema.optional(WireChargeTypeSchema),
});

export type ChargingDetail = typeof ChargingDetailSchema.Type;

export const CancelRequestSchema = Schema.Struct({
  id: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
});

export const PileDescriptionSchema = Schema.Struct({
  charge_id: Schema.String,
  type: WireChargeTypeSchema,
  power: Schema.Number,
  size: Schema.Number,
});

export type PileDescription = typeof PileDescriptionSchema.Type;

export const RejectionSchema = Schema.Struct({
  id: Schema.Number,
  reason: Schema.String,
});

export type Rejection = typeof RejectionSchema.Type;
