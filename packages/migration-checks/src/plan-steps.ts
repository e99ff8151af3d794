/**
 * Plan-to-Steps Builder
 *
 * Turns the steps named in a migration plan into workflow steps wired to the
 * checks and orchestrators of this package. Only `upgrade_replica` mutates;
 * `promote` re-validates behind the confirmation gate and performs no cutover.
 */

import {
  Check,
  CheckInput,
  ChecksRunner,
  Finding,
  Logger,
  MigrationPlan,
  PlanStepName,
  PromotionGate,
  Step,
  checkInputFromPlan,
  createLogger,
  firstReplica,
  hasBlock,
  mutatingStep,
  planSteps,
  readOnlyStep,
  withMeta,
} from '@shiftgate/migration-engine';
import { DebeziumHealthCheck, DebeziumInspector } from './debezium-health';
import { MySQLCompatibilityCheck, MySQLInspector } from './mysql-compat';
import { ReplicaActions, ReplicaInspector, ReplicaUpgradeOrchestrator } from './replica-upgrade';
import { KafkaInspector, SchemaHistoryCheck } from './schema-history';
import { SchemaInspector, SchemaParityCheck } from './schema-parity';

export interface PlanStepDependencies {
  schemaInspector: SchemaInspector;
  debeziumInspector: DebeziumInspector;
  replicaInspector: ReplicaInspector;
  replicaActions: ReplicaActions;
  /** Enables the schema history check when the plan names a topic */
  kafkaInspector?: KafkaInspector;
  /** Adds the 5.7 → 8.0 compatibility check to preflight */
  mysqlInspector?: MySQLInspector;
  /** Phrase supplied by the operator for the promote step */
  confirmation?: string;
  /** Phrase the promote step requires */
  confirmationPhrase?: string;
  restartLoopMax?: number;
  restartLoopWindowMs?: number;
  now?: () => Date;
  logger?: Logger;
}

export function buildPlanSteps(plan: MigrationPlan, deps: PlanStepDependencies): Step[] {
  const logger = deps.logger ?? createLogger();
  const replica = firstReplica(plan);
  const input = checkInputFromPlan(plan, replica);

  const parityCheck = (replicaHost: string | undefined): Check =>
    new SchemaParityCheck({
      inspector: deps.schemaInspector,
      primaryHost: plan.topology.primary,
      replicaHost,
    });

  const cdcChecks = (): Check[] => {
    const checks: Check[] = [
      new DebeziumHealthCheck({
        inspector: deps.debeziumInspector,
        connector: plan.cdc.connector,
        restartLoopMax: deps.restartLoopMax,
        restartLoopWindowMs: deps.restartLoopWindowMs,
        now: deps.now,
      }),
    ];
    const topic = plan.cdc.schema_history_topic;
    if (deps.kafkaInspector && topic && topic.trim() !== '') {
      checks.push(
        new SchemaHistoryCheck({
          inspector: deps.kafkaInspector,
          topic,
          expectedTables: plan.cdc.tables,
        })
      );
    }
    return checks;
  };

  const promotionChecks = (): Check[] => [parityCheck(replica), ...cdcChecks()];

  const runChecks = async (checks: Check[], checkInput: CheckInput, signal: AbortSignal): Promise<Finding[]> => {
    const { results } = await new ChecksRunner(checks, logger).run(checkInput, signal);
    return results.flatMap((r) => r.findings.map((f) => withMeta(f, { check: r.checkName })));
  };

  const builders: Record<PlanStepName, () => Step> = {
    preflight: () =>
      readOnlyStep('preflight', async (_state, signal) => {
        const checks = [parityCheck(replica), ...cdcChecks()];
        if (deps.mysqlInspector) {
          checks.push(
            new MySQLCompatibilityCheck({
              inspector: deps.mysqlInspector,
              schemaInspector: deps.schemaInspector,
              primaryHost: plan.topology.primary,
            })
          );
        }
        return { findings: await runChecks(checks, input, signal) };
      }),

    upgrade_replica: () =>
      mutatingStep('upgrade_replica', async (state, signal) => {
        const orchestrator = new ReplicaUpgradeOrchestrator({
          inspector: deps.replicaInspector,
          actions: deps.replicaActions,
          state,
          primary: plan.topology.primary,
          logger,
        });
        const findings: Finding[] = [];
        for (const host of plan.topology.replicas) {
          const outcome = await orchestrator.run(host, signal);
          findings.push(...outcome.findings);
          if (hasBlock(outcome.findings)) {
            break;
          }
        }
        return { findings };
      }),

    validate_replica: () =>
      readOnlyStep('validate_replica', async (_state, signal) => {
        const findings: Finding[] = [];
        for (const host of plan.topology.replicas) {
          const replicaFindings = await runChecks([parityCheck(host)], checkInputFromPlan(plan, host), signal);
          findings.push(...replicaFindings.map((f) => withMeta(f, { replica: host })));
        }
        return { findings };
      }),

    cdc_check: () =>
      readOnlyStep('cdc_check', async (_state, signal) => ({
        findings: await runChecks(cdcChecks(), input, signal),
      })),

    promote: () =>
      readOnlyStep('promote', async (_state, signal) => {
        const gate = new PromotionGate({
          checks: promotionChecks(),
          confirmationPhrase: deps.confirmationPhrase,
          logger,
        });
        const { findings } = await gate.run(input, deps.confirmation ?? '', signal);
        return { findings };
      }),

    post_validation: () =>
      readOnlyStep('post_validation', async (_state, signal) => ({
        findings: await runChecks(promotionChecks(), input, signal),
      })),
  };

  return planSteps(plan).map((name) => builders[name]());
}
