import { Data } from "effect";

export class InterruptionNotAllowedError extends Data.TaggedError('InterruptionNotAllowed') {
  public override readonly message = 'Interruption is disabled for this pile';
}
