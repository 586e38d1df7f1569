import { Either, Option } from "effect";
import { AdmissionRejectedError } from "../errors/admission-rejected.error.js";
import { queued, startCharging, type ChargeRequest, type ChargingSession, type QueuedSession } from "./charge-session.js";

/**
 * Fixed-capacity FIFO of one pile. The active session counts against the capacity:
 * `waiting.length + (active ? 1 : 0) <= capacity` holds after every operation.
 */
export class AdmissionQueue {
  private waiting: QueuedSession[] = [];
  private active: ChargingSession | null = null;

  public constructor(public readonly capacity: number) { }

  public get size(): number {
    return this.waiting.length + (this.active ? 1 : 0);
  }

  public get activeSession(): ChargingSession | null {
    return this.active;
  }

  public get waitingSessions(): readonly QueuedSession[] {
    return this.waiting;
  }

  public has(requestId: number): boolean {
    return this.active?.request.id === requestId
      || this.waiting.some((session) => session.request.id === requestId);
  }

  public enqueue(request: ChargeRequest): Either.Either<QueuedSession, AdmissionRejectedError> {
    if (this.has(request.id)) {
      return Either.left(new AdmissionRejectedError({ requestId: request.id, reason: 'DuplicateRequest' }));
    }

    if (this.size >= this.capacity) {
      return Either.left(new AdmissionRejectedError({ requestId: request.id, reason: 'QueueFull' }));
    }

    const session = queued(request);
    this.waiting.push(session);

    return Either.right(session);
  }

  // strict FIFO: the head of `waiting` is always the earliest submitted request
  public promote(at: Date): Option.Option<ChargingSession> {
    if (this.active) {
      return Option.none();
    }

    const head = this.waiting.shift();
    if (!head) {
      return Option.none();
    }

    this.active = startCharging(head, at);

    return Option.some(this.active);
  }

  public updateActive(session: ChargingSession): void {
    if (this.active?.request.id !== session.request.id) {
      throw new Error(`Session ${session.request.id} is not the active session`);
    }

    this.active = session;
  }

  public releaseActive(): Option.Option<ChargingSession> {
    const released = Option.fromNullable(this.active);
    this.active = null;

    return released;
  }

  public cancelWaiting(requestId: number): Option.Option<QueuedSession> {
    const index = this.waiting.findIndex((session) => session.request.id === requestId);
    if (index === -1) {
      return Option.none();
    }

    const [cancelled] = this.waiting.splice(index, 1);

    return Option.fromNullable(cancelled);
  }

  public drainWaiting(): QueuedSession[] {
    const drained = this.waiting;
    this.waiting = [];

    return drained;
  }
}
