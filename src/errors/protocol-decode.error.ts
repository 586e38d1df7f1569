import { Data } from "effect";

export class ProtocolDecodeError extends Data.TaggedError('ProtocolDecode')<{
  message: string;
  raw: string;
}> {}
