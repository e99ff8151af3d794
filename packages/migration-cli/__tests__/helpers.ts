import * as path from 'path';
import { Logger, createLogger } from '@shiftgate/migration-engine';
import { ShiftgateConfig } from '../src/config';
import { CliOutput } from '../src/output';

export const EXAMPLES_DIR = path.join(__dirname, '..', 'examples');

export function example(name: string): string {
  return path.join(EXAMPLES_DIR, name);
}

export function silentLogger(): Logger {
  return createLogger('test', { sink: () => undefined });
}

export function testConfig(overrides: Partial<ShiftgateConfig> = {}): ShiftgateConfig {
  return {
    statePath: '.shiftgate/state.json',
    confirmationPhrase: 'PROMOTE',
    restartLoopMax: 3,
    restartLoopWindowMinutes: 10,
    logLevel: 'info',
    ...overrides,
  };
}

/**
 * Render payload findings as "SEVERITY message" lines
 */
export function lines(output: CliOutput | undefined): string[] {
  return (output?.findings ?? []).map((f) => `${f.severity} ${f.message}`);
}
