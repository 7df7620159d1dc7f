import { describe, it, expect } from 'vitest';
import { sanitizePayload } from './sanitize.js';

describe('sanitizePayload', () => {
  const createPayload = () => ({
    model_config: { layers: [{ units: 32 }, { units: 10 }] },
    epoch_history: [{ loss: 0.5 }, { loss: 0.3 }],
    score: 0.9,
    trial: { id: 'trial-1', hyperparameters: { lr: 0.01 } },
  });

  it('should remove the excluded fields and keep the rest', () => {
    expect(sanitizePayload(createPayload())).toEqual({
      score: 0.9,
      trial: { id: 'trial-1', hyperparameters: { lr: 0.01 } },
    });
  });

  it('should not mutate the input', () => {
    const payload = createPayload();
    sanitizePayload(payload);

    expect(payload).toEqual(createPayload());
  });

  it('should return a deep copy', () => {
    const payload = createPayload();
    const result = sanitizePayload(payload);

    expect(result.trial).not.toBe(payload.trial);
    payload.trial.hyperparameters.lr = 1;
    expect(result.trial).toEqual({ id: 'trial-1', hyperparameters: { lr: 0.01 } });
  });

  it('should only strip top-level keys', () => {
    const payload = { trial: { model_config: 'kept' } };

    expect(sanitizePayload(payload)).toEqual({ trial: { model_config: 'kept' } });
  });

  it('should be a no-op when no excluded field is present', () => {
    expect(sanitizePayload({ status: 'RUNNING', trials: 3 })).toEqual({
      status: 'RUNNING',
      trials: 3,
    });
  });

  it('should accept a custom excluded set', () => {
    expect(sanitizePayload({ secret: 'x', visible: 1 }, ['secret'])).toEqual({ visible: 1 });
  });

  it('should keep a __proto__ key from parsed JSON as plain data', () => {
    const payload: Record<string, unknown> = JSON.parse('{"__proto__":{"a":1},"score":1,"model_config":{}}');

    const result = sanitizePayload(payload);

    expect(Object.keys(result)).toEqual(['__proto__', 'score']);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toEqual({ a: 1 });
  });
});
