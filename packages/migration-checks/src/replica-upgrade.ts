/**
 * Replica Upgrade Orchestrator
 *
 * Idempotent three-phase upgrade of a single replica:
 *   stop replication → run upgrade → start replication
 *
 * Each phase is checkpointed under scope `replica_upgrade` (entity = replica)
 * only after it succeeds, so a re-run skips finished phases and retries
 * exactly the one that failed. The primary is never touched.
 */

import {
  CHECKPOINT_SCOPES,
  CheckpointKey,
  CheckpointState,
  ConfigurationError,
  Finding,
  Logger,
  MemoryCheckpointState,
  Summary,
  block,
  checkpointKey,
  createLogger,
  errorMessage,
  info,
  readFlag,
  summarize,
  warn,
} from '@shiftgate/migration-engine';

export interface ReplicationStatus {
  ioThreadRunning: boolean;
  sqlThreadRunning: boolean;
}

export interface ReplicaInspector {
  isPrimary(host: string, signal: AbortSignal): Promise<boolean>;
  replicationStatus(replica: string, signal: AbortSignal): Promise<ReplicationStatus>;
}

export interface ReplicaActions {
  stopReplication(replica: string, signal: AbortSignal): Promise<void>;
  runUpgrade(replica: string, signal: AbortSignal): Promise<void>;
  startReplication(replica: string, signal: AbortSignal): Promise<void>;
}

export type UpgradePhase = 'stopped' | 'upgraded' | 'resumed';

export interface ReplicaUpgradeOptions {
  inspector: ReplicaInspector;
  actions: ReplicaActions;
  /** Defaults to a fresh in-memory state */
  state?: CheckpointState;
  /** Configured primary host; never upgraded even if the inspector disagrees */
  primary?: string;
  logger?: Logger;
}

export interface ReplicaUpgradeResult {
  summary: Summary;
  findings: Finding[];
}

interface PhaseDefinition {
  phase: UpgradePhase;
  done: string;
  alreadyDone: string;
  failure: string;
  perform: (actions: ReplicaActions, replica: string, signal: AbortSignal) => Promise<void>;
}

const PHASES: readonly PhaseDefinition[] = [
  {
    phase: 'stopped',
    done: 'replication stopped',
    alreadyDone: 'replication already stopped',
    failure: 'failed to stop replication',
    perform: (actions, replica, signal) => actions.stopReplication(replica, signal),
  },
  {
    phase: 'upgraded',
    done: 'upgrade completed',
    alreadyDone: 'upgrade already completed',
    failure: 'upgrade failed',
    perform: (actions, replica, signal) => actions.runUpgrade(replica, signal),
  },
  {
    phase: 'resumed',
    done: 'replication started',
    alreadyDone: 'replication already started',
    failure: 'failed to start replication',
    perform: (actions, replica, signal) => actions.startReplication(replica, signal),
  },
];

export function upgradeCheckpointKey(replica: string, phase: UpgradePhase): CheckpointKey {
  return checkpointKey(CHECKPOINT_SCOPES.REPLICA_UPGRADE, replica, phase);
}

export class ReplicaUpgradeOrchestrator {
  private readonly inspector: ReplicaInspector;
  private readonly actions: ReplicaActions;
  private readonly state: CheckpointState;
  private readonly primary: string;
  private readonly logger: Logger;

  /**
   * @throws ConfigurationError if the inspector or actions are missing
   */
  constructor(options: ReplicaUpgradeOptions) {
    if (!options.inspector || !options.actions) {
      throw new ConfigurationError('inspector and actions are required');
    }
    this.inspector = options.inspector;
    this.actions = options.actions;
    this.state = options.state ?? new MemoryCheckpointState();
    this.primary = (options.primary ?? '').trim();
    this.logger = (options.logger ?? createLogger()).withComponent('replica-upgrade');
  }

  async run(
    replicaName: string,
    signal: AbortSignal = new AbortController().signal
  ): Promise<ReplicaUpgradeResult> {
    const replica = replicaName.trim();
    if (replica === '') {
      return result([block('replica is required')]);
    }

    let isPrimary: boolean;
    try {
      isPrimary = await this.inspector.isPrimary(replica, signal);
    } catch (error) {
      return result([
        block(`failed to determine primary status: ${errorMessage(error)}`, { replica }),
      ]);
    }
    if (isPrimary || (this.primary !== '' && replica === this.primary)) {
      this.logger.warn('Refusing to upgrade primary', { replica });
      return result([block('refusing to upgrade primary', { replica })]);
    }

    const findings: Finding[] = [];

    try {
      const status = await this.inspector.replicationStatus(replica, signal);
      findings.push(...this.detectPartialProgress(replica, status));
    } catch (error) {
      this.logger.warn('Unable to read replication status; continuing from checkpoints', { replica });
      findings.push(warn(`unable to read replication status: ${errorMessage(error)}`, { replica }));
    }

    for (const entry of PHASES) {
      const key = upgradeCheckpointKey(replica, entry.phase);

      if (readFlag(this.state, key)) {
        findings.push(info(entry.alreadyDone, { replica }));
        continue;
      }

      this.logger.info(`Running phase ${entry.phase}`, { replica });
      try {
        await entry.perform(this.actions, replica, signal);
      } catch (error) {
        this.logger.error(`Phase ${entry.phase} failed`, error, { replica });
        findings.push(block(`${entry.failure}: ${errorMessage(error)}`, { replica }));
        return result(findings);
      }

      try {
        this.state.set(key, true);
      } catch (error) {
        this.logger.error('Failed to record checkpoint', error, { replica });
        findings.push(
          block(`failed to record checkpoint ${entry.phase}: ${errorMessage(error)}`, { replica })
        );
        return result(findings);
      }
      findings.push(info(entry.done, { replica }));
    }

    return result(findings);
  }

  /**
   * Compare live replication threads against recorded checkpoints
   */
  private detectPartialProgress(replica: string, status: ReplicationStatus): Finding[] {
    const findings: Finding[] = [];
    const stopped = readFlag(this.state, upgradeCheckpointKey(replica, 'stopped'));
    const resumed = readFlag(this.state, upgradeCheckpointKey(replica, 'resumed'));

    const threadsRunning = status.ioThreadRunning && status.sqlThreadRunning;
    const threadsStopped = !status.ioThreadRunning && !status.sqlThreadRunning;

    if (threadsStopped && !stopped) {
      findings.push(warn('replication appears stopped but checkpoint is missing', { replica }));
    }
    if (threadsRunning && stopped && !resumed) {
      findings.push(warn('checkpoint indicates replication stopped but status is running', { replica }));
    }
    if (threadsStopped && resumed) {
      findings.push(warn('checkpoint indicates replication started but status is stopped', { replica }));
    }
    return findings;
  }
}

function result(findings: Finding[]): ReplicaUpgradeResult {
  return { summary: summarize(findings), findings };
}
