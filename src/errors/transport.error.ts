import { Data } from "effect";

export class TransportError extends Data.TaggedError("TransportError")<{
  message: string;
  cause?: unknown;
}> {}
