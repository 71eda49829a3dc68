/**
 * Workflow Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_UPLOAD_BYTES,
  loadWorkflowConfig,
  validateWorkflowConfig,
} from './config.js';

describe('loadWorkflowConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadWorkflowConfig({});

    expect(config).toEqual({
      upload: { maxBytes: DEFAULT_MAX_UPLOAD_BYTES },
      approval: { sendForVerification: true, shareBaseUrl: undefined },
      logging: { level: 'info', json: false },
    });
    expect(DEFAULT_MAX_UPLOAD_BYTES).toBe(33554432);
  });

  it('reads every supported variable', () => {
    const config = loadWorkflowConfig({
      MAX_UPLOAD_BYTES: '1024',
      SEND_FOR_VERIFICATION_ON_APPROVAL: 'false',
      PLAN_SHARE_BASE_URL: 'https://planos.example.com',
      LOG_LEVEL: 'DEBUG',
      LOG_JSON: 'true',
    });

    expect(config.upload.maxBytes).toBe(1024);
    expect(config.approval.sendForVerification).toBe(false);
    expect(config.approval.shareBaseUrl).toBe('https://planos.example.com');
    expect(config.logging).toEqual({ level: 'debug', json: true });
  });

  it('ignores an unknown log level', () => {
    expect(loadWorkflowConfig({ LOG_LEVEL: 'verbose' }).logging.level).toBe('info');
  });
});

describe('validateWorkflowConfig', () => {
  it('accepts the defaults', () => {
    expect(validateWorkflowConfig(loadWorkflowConfig({}))).toEqual([]);
  });

  it('reports a non-numeric upload limit and a malformed share URL', () => {
    const config = loadWorkflowConfig({
      MAX_UPLOAD_BYTES: 'abc',
      PLAN_SHARE_BASE_URL: 'not a url',
    });

    expect(validateWorkflowConfig(config)).toEqual([
      'MAX_UPLOAD_BYTES must be a positive integer',
      'PLAN_SHARE_BASE_URL is not a valid URL: not a url',
    ]);
  });
});
