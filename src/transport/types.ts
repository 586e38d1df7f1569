import { Context, type Effect } from "effect";
import type { TransportError } from "../errors/transport.error.js";

export type ITransport = {
  readonly send: (message: string) => Effect.Effect<void, TransportError>;
  // delivers inbound text frames in arrival order until the peer closes the connection
  readonly run: (onMessage: (message: string) => Effect.Effect<void>) => Effect.Effect<void, TransportError>;
};

export class Transport extends Context.Tag("Transport")<Transport, ITransport>() {}
