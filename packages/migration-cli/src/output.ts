/**
 * CLI Output
 *
 * Every invocation prints one payload: a summary plus the ordered findings.
 */

import {
  Finding,
  SeverityLabel,
  Summary,
  block,
  formatSeverity,
  summarize,
} from '@shiftgate/migration-engine';

export interface OutputFinding {
  severity: SeverityLabel;
  message: string;
  meta: Record<string, unknown>;
}

export interface CliOutput {
  summary: Summary;
  findings: OutputFinding[];
}

/**
 * Build a payload; the summary defaults to counting the findings
 */
export function toOutput(findings: readonly Finding[], summary: Summary = summarize(findings)): CliOutput {
  return {
    summary: { info: summary.info, warn: summary.warn, block: summary.block },
    findings: findings.map((f) => ({
      severity: formatSeverity(f.severity),
      message: f.message,
      meta: { ...f.meta },
    })),
  };
}

export function blockOutput(message: string, meta?: Record<string, unknown>): CliOutput {
  return toOutput([block(message, meta)]);
}

export function renderOutput(output: CliOutput): string {
  return JSON.stringify(output, null, 2);
}
