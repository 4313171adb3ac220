import { describe, it, expect } from 'vitest';
import { canTransition, createJobRecord, toSnapshot, transition } from './job-record';
import { InvalidTransitionError } from './errors';
import { ttsRequest } from './test-support';

const t0 = new Date('2025-01-01T00:00:00.000Z');
const t1 = new Date('2025-01-01T00:00:01.000Z');
const t2 = new Date('2025-01-01T00:00:02.000Z');

describe('job record state machine', () => {
  it('creates queued records', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);

    expect(record).toEqual({
      id: 'job-1',
      request: ttsRequest('Hello'),
      status: 'queued',
      createdAt: t0,
      updatedAt: t0,
      startedAt: null,
      completedAt: null,
      errorMessage: null
    });
  });

  it('allows only forward transitions', () => {
    expect(canTransition('queued', 'processing')).toBe(true);
    expect(canTransition('processing', 'completed')).toBe(true);
    expect(canTransition('processing', 'failed')).toBe(true);
    expect(canTransition('queued', 'completed')).toBe(false);
    expect(canTransition('completed', 'processing')).toBe(false);
    expect(canTransition('failed', 'queued')).toBe(false);
  });

  it('stamps timestamps along the happy path', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);

    transition(record, 'processing', t1);
    expect(record.startedAt).toEqual(t1);
    expect(record.updatedAt).toEqual(t1);

    transition(record, 'completed', t2);
    expect(record.status).toBe('completed');
    expect(record.completedAt).toEqual(t2);
    expect(record.errorMessage).toBeNull();
  });

  it('records the failure reason', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);
    transition(record, 'processing', t1);
    transition(record, 'failed', t2, 'engine unavailable');

    expect(record.status).toBe('failed');
    expect(record.errorMessage).toBe('engine unavailable');
    expect(record.completedAt).toEqual(t2);
  });

  it('falls back to a generic failure reason', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);
    transition(record, 'processing', t1);
    transition(record, 'failed', t2);
    expect(record.errorMessage).toBe('Synthesis failed');
  });

  it('rejects illegal transitions without mutating the record', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);

    expect(() => transition(record, 'completed', t1)).toThrow(InvalidTransitionError);
    expect(() => transition(record, 'completed', t1)).toThrow("Job job-1 cannot move from 'queued' to 'completed'");
    expect(record.status).toBe('queued');
    expect(record.updatedAt).toEqual(t0);
  });

  it('produces frozen, detached snapshots', () => {
    const record = createJobRecord('job-1', ttsRequest('Hello'), t0);
    const snapshot = toSnapshot(record);

    transition(record, 'processing', t1);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.status).toBe('queued');
  });
});
