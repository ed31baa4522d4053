/* eslint-disable prefer-destructuring */
import { ValidationError } from 'App/errors/CustomError';
import * as dotenv from 'dotenv';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

const getEnvVariable = (key: string, defaultValue: string): string => {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value;
};

const getEnvNumber = (key: string, defaultValue: number): number => {
  const raw = getEnvVariable(key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Environment variable ${key} is not a number: ${raw}`);
  }
  return value;
};

const getEnvFlag = (key: string, defaultValue: boolean): boolean => {
  const raw = getEnvVariable(key, defaultValue ? '1' : '0').toLowerCase();
  return !['0', 'false', 'off', 'no'].includes(raw);
};

export const PORT = getEnvNumber('PORT', 3000);

export const MODE = getEnvVariable('NODE_ENV', 'development');

export const STAT_URL = getEnvVariable('STAT_URL', 'http://localhost:11334/stat');

export const POLL_INTERVAL_SEC = getEnvNumber('POLL_INTERVAL_SEC', 1.0);

/** 0 means "same as the poll interval". */
export const REQUEST_TIMEOUT_MS = getEnvNumber('REQUEST_TIMEOUT_MS', 0);

export const WINDOW_SIZE = getEnvNumber('WINDOW_SIZE', 80);

export const CHART_HEIGHT = getEnvNumber('CHART_HEIGHT', 6);

export const MAX_NET_ERRORS = getEnvNumber('MAX_NET_ERRORS', 5);

export const LOG_LEVEL = getEnvVariable('LOG_LEVEL', 'warn').toLowerCase();

export const LIVE_EMIT_ENABLED = getEnvFlag('LIVE_EMIT_ENABLED', true);

export const USER_AGENT = 'scanstat-monitor';
