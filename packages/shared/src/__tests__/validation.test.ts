import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { assertValidated, calendarDateSchema } from '../validation';
import { ValidationError } from '../errors';

describe('assertValidated', () => {
  const schema = z.object({ query: z.string().min(1) });

  it('passes through successful parses', () => {
    const parsed = schema.safeParse({ query: 'pipeline' });
    assertValidated(parsed);
    expect(parsed.data.query).toBe('pipeline');
  });

  it('throws ValidationError with field details', () => {
    const parsed = schema.safeParse({ query: 42 });
    try {
      assertValidated(parsed, 'Invalid request');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.message).toBe('Invalid request');
      expect(err.code).toBe('VALIDATION_ERROR');
      expect(err.details?.[0]?.field).toBe('query');
    }
  });
});

describe('calendarDateSchema', () => {
  it('accepts real calendar days', () => {
    expect(calendarDateSchema.safeParse('2024-02-29').success).toBe(true);
  });

  it('rejects impossible days and other shapes', () => {
    expect(calendarDateSchema.safeParse('2023-02-29').success).toBe(false);
    expect(calendarDateSchema.safeParse('01/15/2024').success).toBe(false);
  });
});
