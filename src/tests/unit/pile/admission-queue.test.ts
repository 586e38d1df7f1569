import { describe, it, expect } from '@effect/vitest';
import { Either, Option } from 'effect';
import { AdmissionQueue } from '../../../pile/admission-queue.js';
import type { ChargeRequest } from '../../../pile/charge-session.js';

const request = (id: number): ChargeRequest => ({
  id,
  chargeType: null,
  requestedEnergyKwh: 10,
  arrivedAt: new Date('2024-01-01T00:00:00.000Z'),
});

const at = new Date('2024-01-01T01:00:00.000Z');

describe('AdmissionQueue', () => {
  it('should admit up to capacity and reject the rest', () => {
    const queue = new AdmissionQueue(2);

    expect(Either.isRight(queue.enqueue(request(1)))).toBe(true);
    expect(Option.map(queue.promote(at), (session) => session.request.id)).toEqual(Option.some(1));
    expect(Either.isRight(queue.enqueue(request(2)))).toBe(true);

    const rejected = queue.enqueue(request(3));

    expect(Either.isLeft(rejected) && rejected.left.reason).toBe('QueueFull');
    expect(queue.size).toBe(2);
    expect(queue.activeSession?.request.id).toBe(1);
    expect(queue.waitingSessions.map((session) => session.request.id)).toEqual([2]);
  });

  it('should count waiting requests against capacity while the pile is idle', () => {
    const queue = new AdmissionQueue(2);
    queue.enqueue(request(1));
    queue.enqueue(request(2));

    const rejected = queue.enqueue(request(3));

    expect(Either.isLeft(rejected) && rejected.left.reason).toBe('QueueFull');
  });

  it('should promote in submission order', () => {
    const queue = new AdmissionQueue(3);
    queue.enqueue(request(1));
    queue.enqueue(request(2));
    queue.enqueue(request(3));

    expect(Option.map(queue.promote(at), (session) => session.request.id)).toEqual(Option.some(1));
    expect(Option.isNone(queue.promote(at))).toBe(true);

    queue.releaseActive();

    expect(Option.map(queue.promote(at), (session) => session.request.id)).toEqual(Option.some(2));
  });

  it('should start metering from the promotion instant', () => {
    const queue = new AdmissionQueue(1);
    queue.enqueue(request(1));

    const promoted = Option.getOrThrow(queue.promote(at));

    expect(promoted.status).toBe('Charging');
    expect(promoted.startedAt).toEqual(at);
    expect(promoted.lastBilledAt).toEqual(at);
    expect(promoted.energyDeliveredKwh).toBe(0);
  });

  it('should reject a request id that is already queued or active', () => {
    const queue = new AdmissionQueue(3);
    queue.enqueue(request(1));
    queue.promote(at);
    queue.enqueue(request(2));

    const activeDuplicate = queue.enqueue(request(1));
    const waitingDuplicate = queue.enqueue(request(2));

    expect(Either.isLeft(activeDuplicate) && activeDuplicate.left.reason).toBe('DuplicateRequest');
    expect(Either.isLeft(waitingDuplicate) && waitingDuplicate.left.reason).toBe('DuplicateRequest');
    expect(queue.size).toBe(2);
  });

  it('should cancel a waiting request and free its slot', () => {
    const queue = new AdmissionQueue(2);
    queue.enqueue(request(1));
    queue.enqueue(request(2));

    expect(Option.map(queue.cancelWaiting(2), (session) => session.request.id)).toEqual(Option.some(2));
    expect(Option.isNone(queue.cancelWaiting(2))).toBe(true);
    expect(Either.isRight(queue.enqueue(request(3)))).toBe(true);
    expect(queue.waitingSessions.map((session) => session.request.id)).toEqual([1, 3]);
  });

  it('should not cancel the active session', () => {
    const queue = new AdmissionQueue(2);
    queue.enqueue(request(1));
    queue.promote(at);

    expect(Option.isNone(queue.cancelWaiting(1))).toBe(true);
    expect(queue.activeSession?.request.id).toBe(1);
  });

  it('should drain every waiting request', () => {
    const queue = new AdmissionQueue(3);
    queue.enqueue(request(1));
    queue.promote(at);
    queue.enqueue(request(2));
    queue.enqueue(request(3));

    expect(queue.drainWaiting().map((session) => session.request.id)).toEqual([2, 3]);
    expect(queue.size).toBe(1);
  });

  it('should refuse to replace the active session with another request', () => {
    const queue = new AdmissionQueue(2);
    queue.enqueue(request(1));
    const active = Option.getOrThrow(queue.promote(at));

    expect(() => queue.updateActive({ ...active, request: request(2) })).toThrow('Session 2 is not the active session');
  });

  it('should hold only the active session at capacity 1', () => {
    const queue = new AdmissionQueue(1);
    queue.enqueue(request(1));
    queue.promote(at);

    const rejected = queue.enqueue(request(2));

    expect(Either.isLeft(rejected) && rejected.left.reason).toBe('QueueFull');
    expect(queue.waitingSessions).toHaveLength(0);
  });
});
