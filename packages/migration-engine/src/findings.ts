/**
 * Findings Model
 *
 * Shared value types for every check, step and orchestrator:
 * - Severity: ordered INFO < WARN < BLOCK, BLOCK is the only halting severity
 * - Finding: immutable observation with a message and free-form metadata
 * - Summary: additive counts of findings by severity
 */

/**
 * Ordered severity of a finding.
 *
 * Numeric values carry the total order, so `a > b` compares severities.
 */
export enum Severity {
  Info = 0,
  Warn = 1,
  Block = 2,
}

export type SeverityLabel = 'INFO' | 'WARN' | 'BLOCK';

export type FindingMeta = Readonly<Record<string, unknown>>;

export interface Finding {
  readonly severity: Severity;
  readonly message: string;
  readonly meta: FindingMeta;
}

export interface Summary {
  info: number;
  warn: number;
  block: number;
}

const SEVERITY_LABELS: Record<Severity, SeverityLabel> = {
  [Severity.Info]: 'INFO',
  [Severity.Warn]: 'WARN',
  [Severity.Block]: 'BLOCK',
};

/**
 * Render a severity the way it appears in output payloads and logs
 *
 * @example
 * formatSeverity(Severity.Block) // 'BLOCK'
 */
export function formatSeverity(severity: Severity): SeverityLabel {
  return SEVERITY_LABELS[severity];
}

/**
 * Create an immutable finding
 *
 * The metadata object is copied and frozen together with the finding, so
 * callers cannot mutate a finding after it has been reported.
 */
export function createFinding(
  severity: Severity,
  message: string,
  meta: Record<string, unknown> = {}
): Finding {
  return Object.freeze({
    severity,
    message,
    meta: Object.freeze({ ...meta }),
  });
}

export const info = (message: string, meta?: Record<string, unknown>): Finding =>
  createFinding(Severity.Info, message, meta);

export const warn = (message: string, meta?: Record<string, unknown>): Finding =>
  createFinding(Severity.Warn, message, meta);

export const block = (message: string, meta?: Record<string, unknown>): Finding =>
  createFinding(Severity.Block, message, meta);

/**
 * Return a copy of the finding with extra metadata merged underneath its own.
 * Keys already present on the finding win.
 */
export function withMeta(finding: Finding, defaults: Record<string, unknown>): Finding {
  return createFinding(finding.severity, finding.message, { ...defaults, ...finding.meta });
}

export function emptySummary(): Summary {
  return { info: 0, warn: 0, block: 0 };
}

/**
 * Count findings by severity.
 *
 * Counting is order-independent: any permutation or partition of the same
 * findings produces the same totals once merged.
 */
export function summarize(findings: readonly Finding[]): Summary {
  const summary = emptySummary();
  for (const finding of findings) {
    switch (finding.severity) {
      case Severity.Info:
        summary.info++;
        break;
      case Severity.Warn:
        summary.warn++;
        break;
      case Severity.Block:
        summary.block++;
        break;
    }
  }
  return summary;
}

export function mergeSummaries(...summaries: Summary[]): Summary {
  return summaries.reduce<Summary>(
    (acc, s) => ({
      info: acc.info + s.info,
      warn: acc.warn + s.warn,
      block: acc.block + s.block,
    }),
    emptySummary()
  );
}

export function hasBlock(findings: readonly Finding[]): boolean {
  return findings.some((f) => f.severity === Severity.Block);
}

export function isClean(summary: Summary): boolean {
  return summary.warn === 0 && summary.block === 0;
}

/**
 * Collects findings across batches and tracks whether progression is still
 * allowed. Once a BLOCK has been observed the aggregator stays blocked.
 */
export class ResultAggregator {
  private summary: Summary = emptySummary();
  private blocked = false;

  /**
   * Record a batch of findings
   *
   * @returns true while progression may continue
   */
  addFindings(findings: readonly Finding[]): boolean {
    this.summary = mergeSummaries(this.summary, summarize(findings));
    if (hasBlock(findings)) {
      this.blocked = true;
    }
    return !this.blocked;
  }

  getSummary(): Summary {
    return { ...this.summary };
  }
}
