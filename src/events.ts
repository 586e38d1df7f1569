import type { RejectionReason } from './errors/admission-rejected.error.js';
import type { ChargingSession, FinishedSession, QueuedSession } from './pile/charge-session.js';

// `at` is the simulated instant the transition was observed
export type SessionEvent =
  | { readonly _tag: 'RequestQueued'; readonly session: QueuedSession; readonly at: Date }
  | { readonly _tag: 'RequestCancelled'; readonly session: QueuedSession; readonly at: Date }
  | { readonly _tag: 'RequestRejected'; readonly requestId: number; readonly reason: RejectionReason; readonly at: Date }
  | { readonly _tag: 'SessionAdmitted'; readonly session: ChargingSession; readonly at: Date }
  | { readonly _tag: 'SessionProgress'; readonly session: ChargingSession; readonly at: Date }
  | { readonly _tag: 'SessionCompleted'; readonly session: FinishedSession; readonly at: Date }
  | { readonly _tag: 'SessionInterrupted'; readonly session: FinishedSession; readonly at: Date };

export type PileStateEvent =
  | { readonly _tag: 'PileClosed'; readonly at: Date }
  | { readonly _tag: 'PileOpened'; readonly at: Date };

export type PileEvent = SessionEvent | PileStateEvent;
