/**
 * Debezium Connector Health
 *
 * Validates connector and task state plus restart stability. Every applicable
 * condition is reported; none short-circuits another.
 */

import {
  CHECK_NAMES,
  Check,
  CheckInput,
  ConfigurationError,
  Finding,
  block,
  errorMessage,
  info,
} from '@shiftgate/migration-engine';

export const RUNNING = 'RUNNING';
export const DEFAULT_RESTART_LOOP_MAX = 3;
export const DEFAULT_RESTART_LOOP_WINDOW_MS = 10 * 60 * 1000;

export interface TaskStatus {
  id: number;
  state: string;
  worker?: string;
  trace?: string;
}

export interface ConnectorStatus {
  name: string;
  state: string;
  worker?: string;
  tasks: TaskStatus[];
  restartCount: number;
  lastRestartAt?: Date;
}

export interface DebeziumInspector {
  connectorStatus(connector: string, signal: AbortSignal): Promise<ConnectorStatus>;
}

export interface DebeziumHealthCheckOptions {
  inspector: DebeziumInspector;
  /** Falls back to the check input's connector */
  connector?: string;
  restartLoopMax?: number;
  restartLoopWindowMs?: number;
  now?: () => Date;
}

export class DebeziumHealthCheck implements Check {
  readonly name = CHECK_NAMES.DEBEZIUM_HEALTH;
  readonly readOnly = true;
  private readonly inspector: DebeziumInspector;
  private readonly restartLoopMax: number;
  private readonly restartLoopWindowMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: DebeziumHealthCheckOptions) {
    if (!options.inspector) {
      throw new ConfigurationError('debezium inspector is required');
    }
    this.inspector = options.inspector;
    this.restartLoopMax = options.restartLoopMax || DEFAULT_RESTART_LOOP_MAX;
    this.restartLoopWindowMs = options.restartLoopWindowMs || DEFAULT_RESTART_LOOP_WINDOW_MS;
    this.now = options.now ?? (() => new Date());
  }

  async run(input: CheckInput, signal: AbortSignal): Promise<Finding[]> {
    const connector = (this.options.connector ?? input.cdcConnector ?? '').trim();
    if (connector === '') {
      throw new Error('connector name is required');
    }

    let status: ConnectorStatus;
    try {
      status = await this.inspector.connectorStatus(connector, signal);
    } catch (error) {
      return [block(`failed to read Debezium connector status: ${errorMessage(error)}`, { connector })];
    }

    const name = status.name || connector;
    const findings: Finding[] = [];

    if (status.state !== RUNNING) {
      findings.push(
        block(`connector "${name}" is ${status.state} (expected ${RUNNING})`, {
          connector: name,
          state: status.state,
        })
      );
    }

    for (const task of status.tasks) {
      if (task.state !== RUNNING) {
        findings.push(
          block(`connector "${name}" task ${task.id} is ${task.state}`, {
            connector: name,
            task_id: task.id,
            state: task.state,
            trace: task.trace ?? '',
          })
        );
      }
    }

    if (this.isRestartLoop(status)) {
      const window = formatDuration(this.restartLoopWindowMs);
      findings.push(
        block(
          `connector "${name}" appears to be in a restart loop (${status.restartCount} restarts within ${window})`,
          { connector: name, restart_count: status.restartCount, window }
        )
      );
    }

    if (findings.length === 0) {
      findings.push(info(`connector "${name}" and tasks are ${RUNNING}`, { connector: name }));
    }
    return findings;
  }

  private isRestartLoop(status: ConnectorStatus): boolean {
    if (!status.lastRestartAt || status.restartCount < this.restartLoopMax) {
      return false;
    }
    return this.now().getTime() - status.lastRestartAt.getTime() <= this.restartLoopWindowMs;
  }
}

/**
 * Compact duration rendering
 *
 * @example
 * formatDuration(600_000) // '10m'
 * formatDuration(90_000)  // '1m30s'
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  let out = '';
  if (hours > 0) out += `${hours}h`;
  if (minutes > 0) out += `${minutes}m`;
  if (seconds > 0 || out === '') out += `${seconds}s`;
  return out;
}
