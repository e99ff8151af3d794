/**
 * Configuration Management
 * Reads CLI settings from environment variables; command-line flags win
 */

import {
  ConfigurationError,
  DEFAULT_CONFIRMATION_PHRASE,
  LogLevel,
  isLogLevel,
} from '@shiftgate/migration-engine';
import { DEFAULT_RESTART_LOOP_MAX } from '@shiftgate/migration-checks';

export interface ShiftgateConfig {
  statePath: string;
  confirmationPhrase: string;
  restartLoopMax: number;
  restartLoopWindowMinutes: number;
  logLevel: LogLevel;
}

export const DEFAULT_STATE_PATH = '.shiftgate/state.json';
export const DEFAULT_RESTART_LOOP_WINDOW_MINUTES = 10;

export type Environment = Record<string, string | undefined>;

export class ConfigManager {
  constructor(private readonly env: Environment = process.env) {}

  /**
   * @throws ConfigurationError for malformed values
   */
  getConfig(): ShiftgateConfig {
    const logLevel = this.getEnvVar('SHIFTGATE_LOG_LEVEL', 'info').toLowerCase();
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`Invalid log level in SHIFTGATE_LOG_LEVEL: ${logLevel}`);
    }

    return {
      statePath: this.getEnvVar('SHIFTGATE_STATE_PATH', DEFAULT_STATE_PATH),
      confirmationPhrase: this.getEnvVar('SHIFTGATE_CONFIRMATION_PHRASE', DEFAULT_CONFIRMATION_PHRASE),
      restartLoopMax: this.getPositiveInt('SHIFTGATE_RESTART_LOOP_MAX', DEFAULT_RESTART_LOOP_MAX),
      restartLoopWindowMinutes: this.getPositiveInt(
        'SHIFTGATE_RESTART_LOOP_WINDOW_MINUTES',
        DEFAULT_RESTART_LOOP_WINDOW_MINUTES
      ),
      logLevel,
    };
  }

  private getEnvVar(key: string, defaultValue?: string): string {
    const value = this.env[key] || defaultValue;
    if (!value) {
      throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value;
  }

  private getPositiveInt(key: string, defaultValue: number): number {
    const raw = this.getEnvVar(key, String(defaultValue)).trim();
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
      throw new ConfigurationError(`Invalid numeric value for ${key}: ${raw}`);
    }
    return value;
  }
}
