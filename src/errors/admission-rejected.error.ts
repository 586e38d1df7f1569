import { Data } from "effect";

export type RejectionReason =
  | 'QueueFull'
  | 'ChargeTypeMismatch'
  | 'DuplicateRequest'
  | 'PileClosed';

export class AdmissionRejectedError extends Data.TaggedError('AdmissionRejected')<{
  requestId: number;
  reason: RejectionReason;
}> {}
