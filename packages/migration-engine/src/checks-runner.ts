/**
 * Checks Runner
 *
 * Executes read-only checks against a shared input and aggregates their
 * findings. Unlike the workflow runner it never halts early: the full list
 * always runs and the caller decides what a BLOCK means.
 *
 * Enforced here:
 * - every check must be read-only (otherwise ConfigurationError, nothing runs)
 * - a check failure becomes one BLOCK tagged with the check name
 * - a finding without a message is replaced by a BLOCK naming the check
 */

import { ConfigurationError, errorMessage } from './errors';
import { Finding, Summary, block, emptySummary, mergeSummaries, summarize } from './findings';
import { Logger, createLogger } from './logger';
import { MigrationPlan } from './plan';

/**
 * Plan-derived parameters shared by every check in a run
 */
export interface CheckInput {
  sourceVersion?: string;
  targetVersion?: string;
  primaryHost?: string;
  replicaHost?: string;
  cdcConnector?: string;
}

export interface Check {
  readonly name: string;
  readonly readOnly: boolean;
  run(input: CheckInput, signal: AbortSignal): Promise<Finding[]>;
}

export type CheckFn = (input: CheckInput, signal: AbortSignal) => Promise<Finding[]> | Finding[];

export interface CheckResult {
  checkName: string;
  findings: Finding[];
}

export interface ChecksRunResult {
  summary: Summary;
  results: CheckResult[];
}

export class ChecksRunner {
  private readonly logger: Logger;

  constructor(private readonly checks: Check[], logger?: Logger) {
    this.logger = (logger ?? createLogger()).withComponent('checks-runner');
  }

  /**
   * @throws ConfigurationError if any check is not read-only
   */
  async run(
    input: CheckInput,
    signal: AbortSignal = new AbortController().signal
  ): Promise<ChecksRunResult> {
    const notReadOnly = this.checks.find((c) => !c.readOnly);
    if (notReadOnly) {
      throw new ConfigurationError(`check "${notReadOnly.name}" is not read-only`);
    }

    let summary = emptySummary();
    const results: CheckResult[] = [];

    for (const check of this.checks) {
      this.logger.info('Running check', { check: check.name });

      let findings: Finding[];
      try {
        findings = await check.run(input, signal);
      } catch (error) {
        this.logger.error('Check failed', error, { check: check.name });
        findings = [block(`check error: ${errorMessage(error)}`, { check: check.name })];
      }

      findings = enforceMessages(check.name, findings);
      const checkSummary = summarize(findings);
      summary = mergeSummaries(summary, checkSummary);
      results.push({ checkName: check.name, findings });

      this.logger.info('Check finished', { check: check.name, ...checkSummary });
    }

    return { summary, results };
  }
}

function enforceMessages(checkName: string, findings: Finding[]): Finding[] {
  return findings.map((f) =>
    typeof f.message !== 'string' || f.message.trim() === ''
      ? block(`check "${checkName}" emitted a finding without a message`, { check: checkName })
      : f
  );
}

/**
 * Build a read-only check from a function
 */
export function readOnlyCheck(name: string, fn: CheckFn): Check {
  return {
    name,
    readOnly: true,
    run: async (input, signal) => fn(input, signal),
  };
}

/**
 * Derive check input from a validated plan for the given replica
 */
export function checkInputFromPlan(plan: MigrationPlan, replicaHost?: string): CheckInput {
  return {
    sourceVersion: plan.source_version,
    targetVersion: plan.target_version,
    primaryHost: plan.topology.primary,
    replicaHost,
    cdcConnector: plan.cdc.connector,
  };
}
