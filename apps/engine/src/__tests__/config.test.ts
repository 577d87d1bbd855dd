import { describe, expect, it } from '@jest/globals';
import { ZodError } from 'zod';
import { loadEnv } from '../config/env.js';
import { streamEventSchema } from '../schemas/stream-event.schema.js';

describe('loadEnv()', () => {
  it('applies defaults', () => {
    expect(loadEnv({ DATABASE_URL: 'postgres://localhost:5432/fleet_test' })).toEqual({
      DATABASE_URL: 'postgres://localhost:5432/fleet_test',
      PG_POOL_MAX: 10,
      REVALIDATION_SWEEP_INTERVAL_MS: 60_000,
      ATTENTION_SWEEP_INTERVAL_MS: 60_000,
      STALE_VEHICLE_SWEEP_INTERVAL_MS: 300_000,
      SWEEP_BATCH_SIZE: 100,
    });
  });

  it('coerces numeric variables', () => {
    const env = loadEnv({ DATABASE_URL: 'postgres://localhost/fleet', SWEEP_BATCH_SIZE: '250' });

    expect(env.SWEEP_BATCH_SIZE).toBe(250);
  });

  it('rejects a missing database url and out-of-range values', () => {
    expect(() => loadEnv({})).toThrow(ZodError);
    expect(() => loadEnv({ DATABASE_URL: 'postgres://localhost/fleet', SWEEP_BATCH_SIZE: '5000' })).toThrow(ZodError);
  });
});

describe('streamEventSchema', () => {
  it('accepts string and object labels and keeps unknown fields', () => {
    const event = streamEventSchema.parse({
      id: 'evt-1',
      behaviorLabels: ['Crash', { label: 'Braking', source: 'camera' }],
      startMs: '1709287200000',
      vendorScore: 7,
    });

    expect(event.behaviorLabels).toEqual(['Crash', { label: 'Braking', source: 'camera' }]);
    expect(event.startMs).toBe('1709287200000');
    expect(event['vendorScore']).toBe(7);
  });

  it('rejects an unknown event state', () => {
    expect(() => streamEventSchema.parse({ id: 'evt-1', eventState: 'archived' })).toThrow(ZodError);
  });

  it('requires a non-empty id', () => {
    expect(streamEventSchema.safeParse({ id: '' }).success).toBe(false);
  });
});
