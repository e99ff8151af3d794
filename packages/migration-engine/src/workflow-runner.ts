/**
 * Workflow Runner
 *
 * Executes an ordered list of idempotent steps against checkpoint state.
 *
 * Rules:
 * - Every step must be idempotent, otherwise the run is refused up front
 * - Steps already marked completed are skipped without re-execution
 * - Mutating steps only run when the runner allows mutations; otherwise a
 *   single BLOCK is recorded for the step and the run halts
 * - A step failure becomes a BLOCK appended to the step's own findings
 * - Any BLOCK halts the run; the blocked step is not checkpointed
 * - Cancellation is honoured at step boundaries only
 */

import {
  ConfigurationError,
  RunCancelledError,
  StepFailure,
  errorMessage,
} from './errors';
import { Finding, ResultAggregator, Summary, block, hasBlock, summarize } from './findings';
import { Logger, createLogger } from './logger';
import { CheckpointState, MemoryCheckpointState } from './state';

export interface StepResult {
  findings: Finding[];
}

export interface Step {
  readonly name: string;
  readonly idempotent: boolean;
  readonly mutates: boolean;
  run(state: CheckpointState, signal: AbortSignal): Promise<StepResult> | StepResult;
}

export type StepFn = (state: CheckpointState, signal: AbortSignal) => Promise<StepResult> | StepResult;

export interface WorkflowRunnerOptions {
  /** Defaults to a fresh in-memory state */
  state?: CheckpointState;
  allowMutations?: boolean;
  logger?: Logger;
}

export interface WorkflowRunResult {
  summary: Summary;
  blocked: boolean;
  /** Name of the step that halted the run */
  haltedAt?: string;
}

export const MUTATION_BLOCKED_MESSAGE = 'mutating step blocked by configuration';

export class WorkflowRunner {
  readonly state: CheckpointState;
  private readonly allowMutations: boolean;
  private readonly logger: Logger;
  private readonly results = new Map<string, StepResult>();

  constructor(private readonly steps: Step[], options: WorkflowRunnerOptions = {}) {
    this.state = options.state ?? new MemoryCheckpointState();
    this.allowMutations = options.allowMutations ?? false;
    this.logger = (options.logger ?? createLogger()).withComponent('workflow-runner');
  }

  /**
   * Run the steps in order
   *
   * @throws ConfigurationError if any step is not idempotent (no step runs)
   * @throws RunCancelledError if the signal is aborted at a step boundary
   */
  async run(signal: AbortSignal = new AbortController().signal): Promise<WorkflowRunResult> {
    for (const step of this.steps) {
      if (!step.idempotent) {
        throw new ConfigurationError(
          `step "${step.name}" is not idempotent; all steps must be idempotent`
        );
      }
    }

    this.results.clear();
    const aggregator = new ResultAggregator();

    for (const step of this.steps) {
      if (signal.aborted) {
        this.logger.warn('Run cancelled before step', { step: step.name });
        throw new RunCancelledError(step.name, aggregator.getSummary(), signal.reason);
      }

      if (this.state.isCompleted(step.name)) {
        this.logger.info('Skipping completed step', { step: step.name });
        continue;
      }

      if (step.mutates && !this.allowMutations) {
        const finding = block(MUTATION_BLOCKED_MESSAGE, { step: step.name });
        this.results.set(step.name, { findings: [finding] });
        aggregator.addFindings([finding]);
        this.logger.warn('Mutating step blocked; mutations are not allowed', { step: step.name });
        return { summary: aggregator.getSummary(), blocked: true, haltedAt: step.name };
      }

      this.logger.info('Running step', { step: step.name });
      const findings = await this.execute(step, signal);

      if (!hasBlock(findings)) {
        try {
          this.state.markCompleted(step.name);
        } catch (error) {
          this.logger.error('Failed to record step checkpoint', error, { step: step.name });
          findings.push(
            block(`failed to record completion of step ${step.name}: ${errorMessage(error)}`, {
              step: step.name,
            })
          );
        }
      }

      const stepSummary = summarize(findings);
      this.results.set(step.name, { findings });

      if (!aggregator.addFindings(findings)) {
        this.logger.warn('BLOCK encountered; halting plan execution', { step: step.name, ...stepSummary });
        return { summary: aggregator.getSummary(), blocked: true, haltedAt: step.name };
      }

      this.logger.info('Completed step', { step: step.name, ...stepSummary });
    }

    return { summary: aggregator.getSummary(), blocked: false };
  }

  /**
   * Findings recorded per step during the last run
   */
  getResults(): Map<string, StepResult> {
    return new Map(
      [...this.results].map(([name, r]): [string, StepResult] => [name, { findings: [...r.findings] }])
    );
  }

  private async execute(step: Step, signal: AbortSignal): Promise<Finding[]> {
    try {
      const result = await step.run(this.state, signal);
      return [...result.findings];
    } catch (error) {
      this.logger.error('Step failed', error, { step: step.name });
      const partial = error instanceof StepFailure ? error.findings : [];
      return [...partial, block(`step error: ${errorMessage(error)}`, { step: step.name })];
    }
  }
}

function defineStep(name: string, mutates: boolean, fn: StepFn): Step {
  return {
    name,
    idempotent: true,
    mutates,
    run: (state, signal) => fn(state, signal),
  };
}

/**
 * Step that only inspects target systems
 */
export function readOnlyStep(name: string, fn: StepFn): Step {
  return defineStep(name, false, fn);
}

/**
 * Step that changes target systems; runs only when mutations are allowed
 */
export function mutatingStep(name: string, fn: StepFn): Step {
  return defineStep(name, true, fn);
}
