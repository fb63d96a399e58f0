import { describe, test, expect } from 'vitest';
import {
  instanceNameSchema,
  instanceStatusQuerySchema,
  meshStatusQuerySchema,
  serviceNameSchema,
  setDesiredStateBodySchema,
} from './validation';

describe('serviceNameSchema', () => {
  test('accepts lowercase names with dashes and underscores', () => {
    expect(serviceNameSchema.safeParse('web').success).toBe(true);
    expect(serviceNameSchema.safeParse('web_api-2').success).toBe(true);
  });

  test('rejects uppercase, leading punctuation and long names', () => {
    expect(serviceNameSchema.safeParse('Web').success).toBe(false);
    expect(serviceNameSchema.safeParse('-web').success).toBe(false);
    expect(serviceNameSchema.safeParse('a'.repeat(64)).success).toBe(false);
  });

  test('rejects empty names', () => {
    const result = serviceNameSchema.safeParse('');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Service cannot be empty');
    }
  });
});

describe('instanceNameSchema', () => {
  test('accepts dots and mixed case', () => {
    expect(instanceNameSchema.safeParse('canary.eu_West-1').success).toBe(true);
  });

  test('rejects path separators', () => {
    expect(instanceNameSchema.safeParse('main/../etc').success).toBe(false);
  });
});

describe('instanceStatusQuerySchema', () => {
  test('defaults every flag off', () => {
    expect(instanceStatusQuerySchema.parse({})).toEqual({
      verbose: 0,
      includeSmartstack: false,
      includeEnvoy: false,
      new: false,
    });
  });

  test('parses boolean strings and verbosity', () => {
    expect(
      instanceStatusQuerySchema.parse({ type: 'flink', verbose: '2', includeEnvoy: '1', new: 'true' })
    ).toEqual({ type: 'flink', verbose: 2, includeSmartstack: false, includeEnvoy: true, new: true });
  });

  test('rejects unknown types and out of range verbosity', () => {
    expect(instanceStatusQuerySchema.safeParse({ type: 'marathon' }).success).toBe(false);
    expect(instanceStatusQuerySchema.safeParse({ verbose: '4' }).success).toBe(false);
    expect(instanceStatusQuerySchema.safeParse({ new: 'yes' }).success).toBe(false);
  });
});

describe('meshStatusQuerySchema', () => {
  test('includes both flavors by default', () => {
    expect(meshStatusQuerySchema.parse({})).toEqual({ verbose: 0, includeSmartstack: true, includeEnvoy: true });
  });
});

describe('setDesiredStateBodySchema', () => {
  test('accepts start and stop only', () => {
    expect(setDesiredStateBodySchema.safeParse({ desiredState: 'stop' }).success).toBe(true);
    expect(setDesiredStateBodySchema.safeParse({ desiredState: 'unknown' }).success).toBe(false);
  });
});
