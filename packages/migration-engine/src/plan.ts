/**
 * Migration Plan
 *
 * Declarative definition of a migration: versions, topology, CDC settings and
 * the ordered subset of canonical steps to run. Structure is checked against
 * plan.schema.json; the semantic guard below adds the rules a JSON schema
 * cannot express (blank strings, canonical ordering, duplicates).
 */

import Ajv, { ErrorObject } from 'ajv';
import planSchema from './plan.schema.json';
import { PlanStepName, SUPPORTED_STEPS, isSupportedStep } from './constants';
import { PlanValidationError } from './errors';

export interface Topology {
  primary: string;
  replicas: string[];
}

export interface CdcConfig {
  type: string;
  connector: string;
  /** Kafka topic holding the connector's schema history */
  schema_history_topic?: string;
  /** Tables the schema history is expected to cover */
  tables?: string[];
}

export interface MigrationPlan {
  migration: string;
  source_version: string;
  target_version: string;
  topology: Topology;
  cdc: CdcConfig;
  steps: string[];
}

const ajv = new Ajv({ allErrors: true, strict: true });
const validatePlanShape = ajv.compile<MigrationPlan>(planSchema);

const STEP_POSITION: ReadonlyMap<string, number> = new Map(
  SUPPORTED_STEPS.map((step, index) => [step, index])
);

/**
 * Validate an already-decoded plan document
 *
 * @returns the document typed as a MigrationPlan
 * @throws PlanValidationError listing every problem found
 */
export function validateMigrationPlan(doc: unknown): MigrationPlan {
  if (!validatePlanShape(doc)) {
    const details = (validatePlanShape.errors ?? []).map(formatAjvError);
    throw new PlanValidationError('migration plan validation failed', details);
  }

  const problems = collectPlanProblems(doc);
  if (problems.length > 0) {
    throw new PlanValidationError('migration plan validation failed', problems);
  }
  return doc;
}

/**
 * Semantic problems of a structurally valid plan, in document order
 */
export function collectPlanProblems(plan: MigrationPlan): string[] {
  const problems: string[] = [];

  if (isBlank(plan.migration)) problems.push('migration is required');
  if (isBlank(plan.source_version)) problems.push('source_version is required');
  if (isBlank(plan.target_version)) problems.push('target_version is required');

  if (isBlank(plan.topology.primary)) {
    problems.push('topology.primary is required');
  }
  if (plan.topology.replicas.length === 0) {
    problems.push('topology.replicas must include at least one replica');
  } else {
    plan.topology.replicas.forEach((replica, i) => {
      if (isBlank(replica)) {
        problems.push(`topology.replicas[${i}] is empty`);
      }
    });
  }

  if (isBlank(plan.cdc.type)) problems.push('cdc.type is required');
  if (isBlank(plan.cdc.connector)) problems.push('cdc.connector is required');

  if (plan.steps.length === 0) {
    problems.push('steps must include at least one step');
    return problems;
  }

  const seen = new Set<string>();
  let lastPosition = -1;
  plan.steps.forEach((rawStep, i) => {
    const step = rawStep.trim();
    if (step === '') {
      problems.push(`steps[${i}] is empty`);
      return;
    }
    const position = STEP_POSITION.get(step);
    if (position === undefined) {
      problems.push(`steps[${i}]="${step}" is not supported`);
      return;
    }
    if (seen.has(step)) {
      problems.push(`steps[${i}]="${step}" is duplicated`);
      return;
    }
    if (position < lastPosition) {
      problems.push(`step order invalid at steps[${i}]="${step}"`);
      return;
    }
    seen.add(step);
    lastPosition = position;
  });

  return problems;
}

/**
 * Canonical step names of a validated plan, in plan order
 */
export function planSteps(plan: MigrationPlan): PlanStepName[] {
  return plan.steps.map((s) => s.trim()).filter(isSupportedStep);
}

/**
 * First replica of the topology, the default target for single-replica commands
 */
export function firstReplica(plan: MigrationPlan): string | undefined {
  return plan.topology.replicas[0]?.trim();
}

function isBlank(value: string): boolean {
  return value.trim() === '';
}

function formatAjvError(err: ErrorObject<string, Record<string, unknown>, unknown>): string {
  const instancePath = err.instancePath || '(root)';
  const schemaPath = err.schemaPath || '';
  const message = err.message || 'validation error';
  return `${instancePath} ${message} [${schemaPath}]`.trim();
}
