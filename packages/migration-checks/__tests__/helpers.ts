import { Finding, Logger, createLogger, formatSeverity } from '@shiftgate/migration-engine';

export function silentLogger(): Logger {
  return createLogger('test', { sink: () => undefined });
}

/**
 * Render findings as "SEVERITY message" lines for compact assertions
 */
export function lines(findings: Finding[]): string[] {
  return findings.map((f) => `${formatSeverity(f.severity)} ${f.message}`);
}

export const signal: AbortSignal = new AbortController().signal;
