/**
 * Migration Engine Constants
 */

/**
 * Canonical step order for migration plans. A plan may omit steps but never
 * reorder or repeat them.
 */
export const SUPPORTED_STEPS = [
  'preflight',
  'upgrade_replica',
  'validate_replica',
  'cdc_check',
  'promote',
  'post_validation',
] as const;

export type PlanStepName = (typeof SUPPORTED_STEPS)[number];

export function isSupportedStep(name: string): name is PlanStepName {
  return (SUPPORTED_STEPS as readonly string[]).includes(name);
}

/**
 * Canonical check names
 */
export const CHECK_NAMES = {
  SCHEMA_PARITY: 'schema_parity',
  DEBEZIUM_HEALTH: 'cdc_debezium_health',
  SCHEMA_HISTORY: 'cdc_schema_history',
  MYSQL_COMPAT: 'mysql_compat_57_80',
} as const;

/**
 * Checks that must be present before promotion is re-validated
 */
export const DEFAULT_REQUIRED_PROMOTION_CHECKS: readonly string[] = [
  CHECK_NAMES.DEBEZIUM_HEALTH,
  CHECK_NAMES.SCHEMA_PARITY,
];

export const DEFAULT_CONFIRMATION_PHRASE = 'PROMOTE';

/**
 * Checkpoint scopes
 */
export const CHECKPOINT_SCOPES = {
  WORKFLOW: 'workflow',
  REPLICA_UPGRADE: 'replica_upgrade',
} as const;
