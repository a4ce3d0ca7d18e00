import dotenv from 'dotenv';
import type { LogLevel } from '../types/index.js';

// Load .env before anything reads process.env
dotenv.config();

export function getEnvVar(key: string, required = true): string {
  const value = process.env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

export function getEnvInt(key: string, fallback: number): number {
  const raw = getEnvVar(key, false);
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function getLogLevel(): LogLevel {
  const raw = (getEnvVar('LOG_LEVEL', false) || 'info').toLowerCase();
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

export interface BackfillWindow {
  startDate: string;
  // Empty means up to today
  endDate: string;
}

/**
 * Optional settings only, so argument parsing works without credentials.
 */
export function getBackfillWindow(): BackfillWindow {
  return {
    startDate: getEnvVar('BACKFILL_START_DATE', false) || '2024-01-01',
    endDate: getEnvVar('BACKFILL_END_DATE', false),
  };
}
