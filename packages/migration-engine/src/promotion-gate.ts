/**
 * Promotion Gate
 *
 * Terminal, human-authorized step. Promotion requires the exact confirmation
 * phrase, the minimum set of checks, and a strictly clean re-validation:
 * a single WARN is enough to block here even though it never halts earlier
 * workflow steps.
 */

import { ChecksRunner, Check, CheckInput, CheckResult } from './checks-runner';
import { DEFAULT_CONFIRMATION_PHRASE, DEFAULT_REQUIRED_PROMOTION_CHECKS } from './constants';
import { ConfigurationError } from './errors';
import { Finding, Summary, block, emptySummary, isClean, withMeta } from './findings';
import { Logger, createLogger } from './logger';

export interface PromotionGateOptions {
  checks: Check[];
  /** Defaults to cdc_debezium_health and schema_parity */
  requiredCheckNames?: readonly string[];
  confirmationPhrase?: string;
  logger?: Logger;
}

export interface PromotionResult {
  summary: Summary;
  findings: Finding[];
}

export class PromotionGate {
  private readonly checks: Check[];
  private readonly requiredCheckNames: readonly string[];
  private readonly confirmationPhrase: string;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError if the configured confirmation phrase is blank
   */
  constructor(options: PromotionGateOptions) {
    const phrase = options.confirmationPhrase ?? DEFAULT_CONFIRMATION_PHRASE;
    if (phrase.trim() === '') {
      throw new ConfigurationError('confirmation phrase is required');
    }
    this.checks = options.checks;
    this.requiredCheckNames =
      options.requiredCheckNames && options.requiredCheckNames.length > 0
        ? options.requiredCheckNames
        : DEFAULT_REQUIRED_PROMOTION_CHECKS;
    this.confirmationPhrase = phrase;
    this.logger = (options.logger ?? createLogger()).withComponent('promotion-gate');
  }

  async run(
    input: CheckInput,
    confirmation: string,
    signal: AbortSignal = new AbortController().signal
  ): Promise<PromotionResult> {
    if (confirmation !== this.confirmationPhrase) {
      this.logger.warn('Promotion confirmation mismatch');
      return single(
        block('promotion requires explicit confirmation', { required: this.confirmationPhrase })
      );
    }

    const missing = this.missingChecks();
    if (missing.length > 0) {
      this.logger.warn('Promotion missing required checks', { missing });
      return single(block(`promotion requires checks: ${missing.join(', ')}`, { missing }));
    }

    const runner = new ChecksRunner(this.checks, this.logger);
    const { summary, results } = await runner.run(input, signal);
    const findings = flattenResults(results);

    if (!isClean(summary)) {
      findings.push(
        block(
          `promotion blocked due to WARN/BLOCK findings (WARN=${summary.warn}, BLOCK=${summary.block})`,
          { warn: summary.warn, block: summary.block }
        )
      );
      this.logger.warn('Promotion blocked', { warn: summary.warn, block: summary.block });
      return { summary: { ...summary, block: summary.block + 1 }, findings };
    }

    this.logger.info('Promotion re-validation clean', { info: summary.info });
    return { summary, findings };
  }

  private missingChecks(): string[] {
    const present = new Set(this.checks.map((c) => c.name));
    return this.requiredCheckNames.filter((name) => !present.has(name));
  }
}

function single(finding: Finding): PromotionResult {
  return { summary: { ...emptySummary(), block: 1 }, findings: [finding] };
}

function flattenResults(results: CheckResult[]): Finding[] {
  return results.flatMap((r) => r.findings.map((f) => withMeta(f, { check: r.checkName })));
}
