import { describe, it, expect } from 'vitest';
import ReportingClientDefault, { OUTCOME, ReportingClient, TEST_CREDENTIALS, EXCLUDED_FIELDS } from './index.js';

describe('reporter-sdk exports', () => {
  it('should export the client as default', () => {
    expect(ReportingClientDefault).toBe(ReportingClient);
  });

  it('should expose the outcome values used on the wire and in snapshots', () => {
    expect(OUTCOME).toEqual({
      OK: 'ok',
      AUTH_ERROR: 'authentication error',
      CONNECT_ERROR: 'connection error',
      UPLOAD_ERROR: 'upload error',
      DISABLED: 'disable',
    });
  });

  it('should expose the reserved test credentials', () => {
    expect(TEST_CREDENTIALS).toEqual({ ACCEPTED: 'test_key_true', REJECTED: 'test_key_false' });
  });

  it('should exclude unbounded fields', () => {
    expect(EXCLUDED_FIELDS).toEqual(['model_config', 'epoch_history']);
  });
});
