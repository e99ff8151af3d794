/**
 * CLI Commands
 *
 * Parses arguments and runs one command against the engine and checks,
 * producing the payload the entry point prints. Misuse of the plan, state
 * file or configuration is reported as a single BLOCK payload; only usage
 * errors skip the payload.
 */

import {
  Check,
  ChecksRunner,
  CheckpointPersistenceError,
  ConfigurationError,
  Finding,
  Logger,
  MigrationPlan,
  PromotionGate,
  RunCancelledError,
  WorkflowRunner,
  block,
  checkInputFromPlan,
  firstReplica,
  info,
  loadPlan,
  mergeSummaries,
  summarize,
  withMeta,
  FileCheckpointState,
} from '@shiftgate/migration-engine';
import {
  DebeziumHealthCheck,
  MySQLCompatibilityCheck,
  ReplicaActions,
  ReplicaUpgradeOrchestrator,
  SchemaHistoryCheck,
  SchemaParityCheck,
  buildPlanSteps,
} from '@shiftgate/migration-checks';
import { ShiftgateConfig } from './config';
import {
  DebeziumFileInspector,
  KafkaFileInspector,
  MySQLFileInspector,
  SchemaFileInspector,
  SimulatedReplicaActions,
  StaticReplicaInspector,
  UnconfiguredReplicaActions,
} from './file-inspectors';
import { CliOutput, blockOutput, toOutput } from './output';

export const DEFAULT_PLAN_PATH = 'migration.yaml';

export const USAGE = [
  'Usage:',
  '  shiftgate plan --plan migration.yaml',
  '  shiftgate preflight --plan migration.yaml [--schema-primary path --schema-replica path --cdc-status path --schema-history path --mysql-settings path]',
  '  shiftgate upgrade replica <name> --plan migration.yaml [--state path --simulate --io-running=false --sql-running=false]',
  '  shiftgate validate replica <name> --plan migration.yaml --schema-primary path --schema-replica path',
  '  shiftgate validate primary --plan migration.yaml --schema-primary path --schema-replica path',
  '  shiftgate cdc check --plan migration.yaml --cdc-status path',
  '  shiftgate cdc history --plan migration.yaml --schema-history path',
  '  shiftgate promote --plan migration.yaml --confirm PROMOTE [--phrase PROMOTE] --schema-primary path --schema-replica path --cdc-status path',
  '  shiftgate run --plan migration.yaml [--allow-mutations --simulate --confirm PROMOTE --state path ...]',
  '',
  'Any command accepts --fail-on-block to exit with status 2 when the payload contains a BLOCK.',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ========================================
// Argument parsing
// ========================================

const VALUE_FLAGS = new Set([
  'plan',
  'state',
  'schema-primary',
  'schema-replica',
  'cdc-status',
  'schema-history',
  'mysql-settings',
  'confirm',
  'phrase',
]);

const BOOLEAN_FLAGS = new Set(['simulate', 'allow-mutations', 'fail-on-block', 'io-running', 'sql-running']);

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Map<string, boolean>;
}

/**
 * Accepts `--name value`, `--name=value`, `--switch` and `--switch=false`
 *
 * @throws UsageError for unknown flags or missing values
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], values: new Map(), switches: new Map() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    if (VALUE_FLAGS.has(name)) {
      const value = inline ?? argv[i + 1];
      if (value === undefined || (inline === undefined && value.startsWith('--'))) {
        throw new UsageError(`flag --${name} requires a value`);
      }
      if (inline === undefined) i++;
      parsed.values.set(name, value);
    } else if (BOOLEAN_FLAGS.has(name)) {
      if (inline === undefined || inline === 'true') {
        parsed.switches.set(name, true);
      } else if (inline === 'false') {
        parsed.switches.set(name, false);
      } else {
        throw new UsageError(`flag --${name} expects true or false`);
      }
    } else {
      throw new UsageError(`unknown flag: --${name}`);
    }
  }

  return parsed;
}

type Command =
  | { kind: 'plan' }
  | { kind: 'preflight' }
  | { kind: 'upgrade-replica'; replica: string }
  | { kind: 'validate-replica'; replica: string }
  | { kind: 'validate-primary' }
  | { kind: 'cdc-check' }
  | { kind: 'cdc-history' }
  | { kind: 'promote' }
  | { kind: 'run' };

export function resolveCommand(positionals: string[]): Command {
  if (positionals.length === 0) {
    throw new UsageError('missing command');
  }
  const [cmd, sub, target, ...rest] = positionals;
  const noExtra = (count: number) => positionals.length === count;

  switch (cmd) {
    case 'plan':
      if (noExtra(1)) return { kind: 'plan' };
      break;
    case 'preflight':
      if (noExtra(1)) return { kind: 'preflight' };
      break;
    case 'promote':
      if (noExtra(1)) return { kind: 'promote' };
      break;
    case 'run':
      if (noExtra(1)) return { kind: 'run' };
      break;
    case 'upgrade':
      if (sub === 'replica' && target && rest.length === 0) return { kind: 'upgrade-replica', replica: target };
      break;
    case 'validate':
      if (sub === 'replica' && target && rest.length === 0) return { kind: 'validate-replica', replica: target };
      if (sub === 'primary' && noExtra(2)) return { kind: 'validate-primary' };
      break;
    case 'cdc':
      if (sub === 'check' && noExtra(2)) return { kind: 'cdc-check' };
      if (sub === 'history' && noExtra(2)) return { kind: 'cdc-history' };
      break;
  }
  throw new UsageError(`unknown command: ${positionals.join(' ')}`);
}

// ========================================
// Execution
// ========================================

export interface CommandContext {
  config: ShiftgateConfig;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface CommandResult {
  exitCode: number;
  /** Absent for usage errors */
  output?: CliOutput;
  /** Text for stderr */
  error?: string;
}

export async function runCommand(argv: string[], context: CommandContext): Promise<CommandResult> {
  let args: ParsedArgs;
  let command: Command;
  try {
    args = parseArgs(argv);
    command = resolveCommand(args.positionals);
  } catch (error) {
    if (error instanceof UsageError) {
      return { exitCode: 1, error: `${error.message}\n\n${USAGE}` };
    }
    throw error;
  }

  const logger = context.logger.withComponent('cli');
  const session = new CommandSession(args, context, logger);

  let output: CliOutput;
  try {
    output = await session.execute(command);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof CheckpointPersistenceError) {
      logger.error('Command aborted', error, { command: command.kind });
      output = blockOutput(error.message);
    } else {
      throw error;
    }
  }

  logger.info('Command finished', { command: command.kind, ...output.summary });
  return { exitCode: exitCodeFor(args, output), output };
}

/**
 * Result for configuration that failed to load before any command ran
 */
export function configurationFailure(argv: string[], error: ConfigurationError): CommandResult {
  const output = blockOutput(error.message);
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (parseError) {
    if (parseError instanceof UsageError) {
      return { exitCode: 0, output };
    }
    throw parseError;
  }
  return { exitCode: exitCodeFor(args, output), output };
}

function exitCodeFor(args: ParsedArgs, output: CliOutput): number {
  const failOnBlock = args.switches.get('fail-on-block') ?? false;
  return failOnBlock && output.summary.block > 0 ? 2 : 0;
}

class CommandSession {
  private readonly signal: AbortSignal;

  constructor(
    private readonly args: ParsedArgs,
    private readonly context: CommandContext,
    private readonly logger: Logger
  ) {
    this.signal = context.signal ?? new AbortController().signal;
  }

  async execute(command: Command): Promise<CliOutput> {
    const plan = loadPlan(this.args.values.get('plan') ?? DEFAULT_PLAN_PATH);

    switch (command.kind) {
      case 'plan':
        return toOutput([info(`plan "${plan.migration}" is valid`, { steps: [...plan.steps] })]);

      case 'preflight': {
        const replica = requireReplica(plan);
        const checks = [this.parityCheck(plan, replica), this.debeziumCheck(plan), ...this.optionalChecks(plan)];
        return this.runChecks(checks, plan, replica);
      }

      case 'upgrade-replica':
        return this.upgradeReplica(plan, command.replica);

      case 'validate-replica':
        return this.runChecks([this.parityCheck(plan, command.replica)], plan, command.replica);

      case 'validate-primary': {
        const replica = requireReplica(plan);
        return this.runChecks([this.parityCheck(plan, replica)], plan, replica);
      }

      case 'cdc-check':
        return this.runChecks([this.debeziumCheck(plan)], plan);

      case 'cdc-history': {
        const topic = plan.cdc.schema_history_topic;
        if (!topic || topic.trim() === '') {
          throw new ConfigurationError('plan does not define cdc.schema_history_topic');
        }
        const check = new SchemaHistoryCheck({
          inspector: new KafkaFileInspector(this.args.values.get('schema-history')),
          topic,
          expectedTables: plan.cdc.tables,
        });
        return this.runChecks([check], plan);
      }

      case 'promote':
        return this.promote(plan);

      case 'run':
        return this.runPlan(plan);
    }
  }

  private async runChecks(checks: Check[], plan: MigrationPlan, replica?: string): Promise<CliOutput> {
    const runner = new ChecksRunner(checks, this.logger);
    const { summary, results } = await runner.run(checkInputFromPlan(plan, replica), this.signal);
    const findings = results.flatMap((r) => r.findings.map((f) => withMeta(f, { check: r.checkName })));
    return toOutput(findings, summary);
  }

  private async upgradeReplica(plan: MigrationPlan, replica: string): Promise<CliOutput> {
    const orchestrator = new ReplicaUpgradeOrchestrator({
      inspector: this.replicaInspector(plan),
      actions: this.replicaActions(),
      state: this.openState(),
      primary: plan.topology.primary,
      logger: this.logger,
    });
    const { summary, findings } = await orchestrator.run(replica, this.signal);
    return toOutput(findings, summary);
  }

  private async promote(plan: MigrationPlan): Promise<CliOutput> {
    const replica = requireReplica(plan);
    const gate = new PromotionGate({
      checks: [this.parityCheck(plan, replica), this.debeziumCheck(plan), ...this.historyChecks(plan)],
      confirmationPhrase: this.confirmationPhrase(),
      logger: this.logger,
    });
    const { summary, findings } = await gate.run(
      checkInputFromPlan(plan, replica),
      this.args.values.get('confirm') ?? '',
      this.signal
    );
    return toOutput(findings, summary);
  }

  private async runPlan(plan: MigrationPlan): Promise<CliOutput> {
    const historyPath = this.args.values.get('schema-history');
    const mysqlPath = this.args.values.get('mysql-settings');
    const steps = buildPlanSteps(plan, {
      schemaInspector: this.schemaInspector(plan),
      debeziumInspector: new DebeziumFileInspector(this.args.values.get('cdc-status')),
      kafkaInspector: historyPath ? new KafkaFileInspector(historyPath) : undefined,
      mysqlInspector: mysqlPath ? new MySQLFileInspector(mysqlPath) : undefined,
      replicaInspector: this.replicaInspector(plan),
      replicaActions: this.replicaActions(),
      confirmation: this.args.values.get('confirm'),
      confirmationPhrase: this.confirmationPhrase(),
      restartLoopMax: this.context.config.restartLoopMax,
      restartLoopWindowMs: this.restartLoopWindowMs(),
      now: this.context.now,
      logger: this.logger,
    });

    const runner = new WorkflowRunner(steps, {
      state: this.openState(),
      allowMutations: this.args.switches.get('allow-mutations') ?? false,
      logger: this.logger,
    });

    const collect = (): Finding[] =>
      [...runner.getResults()].flatMap(([step, r]) => r.findings.map((f) => withMeta(f, { step })));

    try {
      const result = await runner.run(this.signal);
      return toOutput(collect(), result.summary);
    } catch (error) {
      if (error instanceof RunCancelledError) {
        const cancelled = block(error.message, { step: error.stepName });
        return toOutput([...collect(), cancelled], mergeSummaries(error.summary, summarize([cancelled])));
      }
      throw error;
    }
  }

  // ========================================
  // Collaborators
  // ========================================

  private schemaInspector(plan: MigrationPlan): SchemaFileInspector {
    return new SchemaFileInspector({
      primaryHost: plan.topology.primary,
      primaryPath: this.args.values.get('schema-primary'),
      replicaPath: this.args.values.get('schema-replica'),
    });
  }

  private parityCheck(plan: MigrationPlan, replica: string): Check {
    return new SchemaParityCheck({
      inspector: this.schemaInspector(plan),
      primaryHost: plan.topology.primary,
      replicaHost: replica,
    });
  }

  private debeziumCheck(plan: MigrationPlan): Check {
    return new DebeziumHealthCheck({
      inspector: new DebeziumFileInspector(this.args.values.get('cdc-status')),
      connector: plan.cdc.connector,
      restartLoopMax: this.context.config.restartLoopMax,
      restartLoopWindowMs: this.restartLoopWindowMs(),
      now: this.context.now,
    });
  }

  /**
   * Schema history check, when the plan names a topic and a history file is given
   */
  private historyChecks(plan: MigrationPlan): Check[] {
    const topic = plan.cdc.schema_history_topic;
    const historyPath = this.args.values.get('schema-history');
    if (!topic || topic.trim() === '' || !historyPath) {
      return [];
    }
    return [
      new SchemaHistoryCheck({
        inspector: new KafkaFileInspector(historyPath),
        topic,
        expectedTables: plan.cdc.tables,
      }),
    ];
  }

  private optionalChecks(plan: MigrationPlan): Check[] {
    const checks = this.historyChecks(plan);
    const mysqlPath = this.args.values.get('mysql-settings');
    if (mysqlPath) {
      checks.push(
        new MySQLCompatibilityCheck({
          inspector: new MySQLFileInspector(mysqlPath),
          schemaInspector: this.schemaInspector(plan),
          primaryHost: plan.topology.primary,
        })
      );
    }
    return checks;
  }

  private replicaInspector(plan: MigrationPlan): StaticReplicaInspector {
    return new StaticReplicaInspector(plan.topology.primary, {
      ioThreadRunning: this.args.switches.get('io-running') ?? true,
      sqlThreadRunning: this.args.switches.get('sql-running') ?? true,
    });
  }

  private replicaActions(): ReplicaActions {
    return this.args.switches.get('simulate') ? new SimulatedReplicaActions() : new UnconfiguredReplicaActions();
  }

  private openState(): FileCheckpointState {
    return FileCheckpointState.open(this.args.values.get('state') ?? this.context.config.statePath);
  }

  private confirmationPhrase(): string {
    return this.args.values.get('phrase') ?? this.context.config.confirmationPhrase;
  }

  private restartLoopWindowMs(): number {
    return this.context.config.restartLoopWindowMinutes * 60 * 1000;
  }
}

function requireReplica(plan: MigrationPlan): string {
  const replica = firstReplica(plan);
  if (!replica) {
    throw new ConfigurationError('no replicas defined in plan');
  }
  return replica;
}
