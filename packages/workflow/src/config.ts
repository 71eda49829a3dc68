/**
 * Workflow Configuration
 *
 * Environment-based configuration for the application layer.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Load environment variables from root .env
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenvConfig({ path: resolve(__dirname, '../../../.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface WorkflowConfig {
  // Uploads
  upload: {
    maxBytes: number;
  };

  // Approval
  approval: {
    sendForVerification: boolean;
    shareBaseUrl?: string;
  };

  // Logging
  logging: {
    level: LogLevel;
    json: boolean;
  };
}

export const DEFAULT_MAX_UPLOAD_BYTES = 32 * 1024 * 1024;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value?: string): LogLevel {
  const level = (value || 'info').toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === 'true';
}

export function loadWorkflowConfig(env: NodeJS.ProcessEnv = process.env): WorkflowConfig {
  return {
    upload: {
      maxBytes: parseInt(env.MAX_UPLOAD_BYTES || String(DEFAULT_MAX_UPLOAD_BYTES), 10),
    },
    approval: {
      sendForVerification: parseBool(env.SEND_FOR_VERIFICATION_ON_APPROVAL, true),
      shareBaseUrl: env.PLAN_SHARE_BASE_URL || undefined,
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      json: parseBool(env.LOG_JSON, false),
    },
  };
}

/**
 * Returns a list of configuration problems; empty when the config is usable.
 */
export function validateWorkflowConfig(config: WorkflowConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.upload.maxBytes) || config.upload.maxBytes <= 0) {
    errors.push('MAX_UPLOAD_BYTES must be a positive integer');
  }

  if (config.approval.shareBaseUrl) {
    try {
      new URL(config.approval.shareBaseUrl);
    } catch {
      errors.push(`PLAN_SHARE_BASE_URL is not a valid URL: ${config.approval.shareBaseUrl}`);
    }
  }

  return errors;
}
