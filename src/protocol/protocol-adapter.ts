import { Either, Schema } from "effect";
import { ProtocolDecodeError } from "../errors/protocol-decode.error.js";
import { totalCost, type ChargeSession, type ChargeType, type Metering } from "../pile/charge-session.js";
import type { PileCommand } from "../pile/pile-driver.js";
import type { PileConfig } from "../pile/pile.js";
import type { PileEvent } from "../events.js";
import {
  CancelRequestSchema,
  ChargingDetailSchema,
  EnvelopeSchema,
  PileDescriptionSchema,
  RejectionSchema,
  type ChargingDetail,
  type MessageType,
} from "./schema.js";

const decodeEnvelope = Schema.decodeUnknownEither(Schema.parseJson(EnvelopeSchema));
const decodeDetail = Schema.decodeUnknownEither(Schema.parseJson(ChargingDetailSchema));
const decodeCancel = Schema.decodeUnknownEither(Schema.parseJson(CancelRequestSchema));

const encodeEnvelope = Schema.encodeSync(Schema.parseJson(EnvelopeSchema));
const encodeDetail = Schema.encodeSync(Schema.parseJson(ChargingDetailSchema));
const encodeDescription = Schema.encodeSync(Schema.parseJson(PileDescriptionSchema));
const encodeRejection = Schema.encodeSync(Schema.parseJson(RejectionSchema));

export const toWireChargeType = (chargeType: ChargeType): "F" | "T" => chargeType === "fast" ? "F" : "T";

const fromWireChargeType = (type: "F" | "T" | undefined): ChargeType | null => {
  switch (type) {
    case "F":
      return "fast";
    case "T":
      return "slow";
    default:
      return null;
  }
};

const round = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

// a `new` request must not carry any progress
const isFresh = (detail: ChargingDetail): boolean =>
  detail.status === "waiting"
  && detail.already_charged === 0
  && detail.start_time === null
  && detail.last_update_time === null
  && detail.end_time === null
  && detail.charge_cost === 0
  && detail.service_fee === 0
  && detail.total_cost === 0;

/**
 * Turns one inbound text frame into a pile command. `receivedAt` is the simulated
 * instant stamped on new requests as their arrival time.
 */
export const decodeInbound = (raw: string, receivedAt: Date): Either.Either<PileCommand, ProtocolDecodeError> => {
  const malformed = (message: string) => new ProtocolDecodeError({ message, raw });

  return Either.gen(function* () {
    const envelope = yield* Either.mapLeft(decodeEnvelope(raw), (err) => malformed(`Malformed message: ${err.message}`));
    const data = envelope.data ?? "";

    switch (envelope.type) {
      case "new": {
        const detail = yield* Either.mapLeft(decodeDetail(data), (err) => malformed(`Malformed charging detail: ${err.message}`));
        if (!isFresh(detail)) {
          return yield* Either.left(malformed(`Charging detail ${detail.id} is not a new request`));
        }

        const command: PileCommand = {
          _tag: "Submit",
          request: {
            id: detail.id,
            chargeType: fromWireChargeType(detail.type),
            requestedEnergyKwh: detail.request_amount,
            arrivedAt: receivedAt,
          },
        };
        return command;
      }
      case "cancel": {
        const { id } = yield* Either.mapLeft(decodeCancel(data), (err) => malformed(`Malformed cancel request: ${err.message}`));
        const command: PileCommand = { _tag: "Cancel", requestId: id };
        return command;
      }
      case "close": {
        const command: PileCommand = { _tag: "Close" };
        return command;
      }
      case "open": {
        const command: PileCommand = { _tag: "Open" };
        return command;
      }
      default:
        return yield* Either.left(malformed(`Unexpected message type: ${envelope.type}`));
    }
  });
};

const meteringFields = (metering: Metering) => ({
  already_charged: round(metering.energyDeliveredKwh, 3),
  charge_cost: round(metering.chargeCost, 2),
  service_fee: round(metering.serviceFee, 2),
  total_cost: round(totalCost(metering), 2),
});

export const toChargingDetail = (session: ChargeSession, chargeType: ChargeType): ChargingDetail => {
  const base = {
    id: session.request.id,
    request_amount: session.request.requestedEnergyKwh,
    type: toWireChargeType(chargeType),
  };

  switch (session.status) {
    case "Queued":
      return {
        ...base,
        already_charged: 0,
        start_time: null,
        last_update_time: null,
        end_time: null,
        charge_cost: 0,
        service_fee: 0,
        total_cost: 0,
        status: "waiting",
      };
    case "Charging":
      return {
        ...base,
        ...meteringFields(session),
        start_time: session.startedAt.toISOString(),
        last_update_time: session.lastBilledAt.toISOString(),
        end_time: null,
        status: "charging",
      };
    case "Completed":
    case "Interrupted":
      return {
        ...base,
        ...meteringFields(session),
        start_time: session.startedAt.toISOString(),
        last_update_time: session.lastBilledAt.toISOString(),
        end_time: session.endedAt.toISOString(),
        status: session.status === "Completed" ? "completed" : "interrupted",
      };
  }
};

const envelope = (type: MessageType, data: string, at: Date): string =>
  encodeEnvelope({ type, data, at: at.toISOString() });

const describePile = (pile: PileConfig): string => encodeDescription({
  charge_id: pile.id,
  type: toWireChargeType(pile.chargeType),
  power: pile.powerKw,
  size: pile.queueCapacity,
});

export const encodeRegister = (pile: PileConfig, at: Date): string => envelope("register", describePile(pile), at);

export const encodeEvent = (event: PileEvent, pile: PileConfig): string => {
  const detail = (session: ChargeSession) => encodeDetail(toChargingDetail(session, pile.chargeType));

  switch (event._tag) {
    case "RequestQueued":
    case "SessionAdmitted":
    case "SessionProgress":
      return envelope("update", detail(event.session), event.at);
    case "SessionCompleted":
      return envelope("complete", detail(event.session), event.at);
    case "SessionInterrupted":
      return envelope("fault", detail(event.session), event.at);
    case "RequestCancelled":
      return envelope("cancel", encodeDetail({
        ...toChargingDetail(event.session, pile.chargeType),
        last_update_time: event.at.toISOString(),
        status: "interrupted",
      }), event.at);
    case "RequestRejected":
      return envelope("reject", encodeRejection({ id: event.requestId, reason: event.reason }), event.at);
    case "PileClosed":
      return envelope("close", describePile(pile), event.at);
    case "PileOpened":
      return envelope("open", describePile(pile), event.at);
  }
};
