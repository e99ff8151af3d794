/**
 * File-backed Inspectors
 *
 * Inspection backends reading JSON snapshots from disk, plus the replica
 * inspector and action backends the CLI drives the upgrade with. Read
 * failures are thrown; the checks turn them into findings.
 */

import * as fs from 'fs';
import { z } from 'zod';
import type {
  ConnectorStatus,
  DebeziumInspector,
  KafkaInspector,
  MySQLInspector,
  ReplicaActions,
  ReplicaInspector,
  ReplicationStatus,
  Schema,
  SchemaInspector,
} from '@shiftgate/migration-checks';
import { errorMessage } from '@shiftgate/migration-engine';
import {
  ConnectorStatusFileSchema,
  MySQLSettingsFile,
  MySQLSettingsFileSchema,
  SchemaHistoryFile,
  SchemaHistoryFileSchema,
  SchemaSnapshotSchema,
  toConnectorStatus,
  toSchema,
} from './contracts';

/**
 * Read and validate a JSON snapshot
 *
 * @throws Error naming the file when it is missing, unreadable or invalid
 */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, label: string): z.output<S> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new Error(`cannot read ${label} file ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`${label} file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i: z.ZodIssue) => `${i.path.join('.') || '(root)'}: ${i.message}`
    );
    throw new Error(`${label} file ${filePath} is invalid: ${issues.join('; ')}`);
  }
  return result.data;
}

export interface SchemaFileInspectorOptions {
  primaryHost: string;
  primaryPath?: string;
  /** Snapshot used for every host other than the primary */
  replicaPath?: string;
}

export class SchemaFileInspector implements SchemaInspector {
  constructor(private readonly options: SchemaFileInspectorOptions) {}

  async schema(host: string): Promise<Schema> {
    if (!host) {
      throw new Error('host is required');
    }
    const filePath = host === this.options.primaryHost ? this.options.primaryPath : this.options.replicaPath;
    if (!filePath) {
      throw new Error(`schema file path required for host "${host}"`);
    }
    return toSchema(readJsonFile(filePath, SchemaSnapshotSchema, 'schema'));
  }
}

export class DebeziumFileInspector implements DebeziumInspector {
  constructor(private readonly filePath?: string) {}

  async connectorStatus(connector: string): Promise<ConnectorStatus> {
    if (!this.filePath) {
      throw new Error('cdc status file path is required');
    }
    return toConnectorStatus(readJsonFile(this.filePath, ConnectorStatusFileSchema, 'cdc status'), connector);
  }
}

export class KafkaFileInspector implements KafkaInspector {
  constructor(private readonly filePath?: string) {}

  async topicExists(topic: string): Promise<boolean> {
    return Object.prototype.hasOwnProperty.call(this.load().topics, topic);
  }

  async topicReadable(topic: string): Promise<boolean> {
    return this.load().topics[topic]?.readable ?? false;
  }

  async schemaHistoryTables(topic: string): Promise<string[]> {
    const entry = this.load().topics[topic];
    if (!entry) {
      throw new Error(`topic "${topic}" not present in schema history file`);
    }
    return entry.tables;
  }

  private load(): SchemaHistoryFile {
    if (!this.filePath) {
      throw new Error('schema history file path is required');
    }
    return readJsonFile(this.filePath, SchemaHistoryFileSchema, 'schema history');
  }
}

export class MySQLFileInspector implements MySQLInspector {
  constructor(private readonly filePath: string) {}

  async sqlMode(): Promise<string> {
    return this.load().sql_mode;
  }

  async deprecatedFeaturesUsed(): Promise<string[]> {
    return this.load().deprecated_features;
  }

  private load(): MySQLSettingsFile {
    return readJsonFile(this.filePath, MySQLSettingsFileSchema, 'mysql settings');
  }
}

/**
 * Replica inspector answering from operator-supplied flags
 */
export class StaticReplicaInspector implements ReplicaInspector {
  constructor(private readonly primaryHost: string, private readonly status: ReplicationStatus) {}

  async isPrimary(host: string): Promise<boolean> {
    return host === this.primaryHost;
  }

  async replicationStatus(): Promise<ReplicationStatus> {
    return { ...this.status };
  }
}

/**
 * Actions that succeed without touching any server
 */
export class SimulatedReplicaActions implements ReplicaActions {
  readonly performed: string[] = [];

  async stopReplication(replica: string): Promise<void> {
    this.performed.push(`stop:${replica}`);
  }

  async runUpgrade(replica: string): Promise<void> {
    this.performed.push(`upgrade:${replica}`);
  }

  async startReplication(replica: string): Promise<void> {
    this.performed.push(`start:${replica}`);
  }
}

export const ACTIONS_NOT_CONFIGURED = 'replica actions not configured; use --simulate or provide an implementation';

export class UnconfiguredReplicaActions implements ReplicaActions {
  async stopReplication(): Promise<void> {
    throw new Error(ACTIONS_NOT_CONFIGURED);
  }

  async runUpgrade(): Promise<void> {
    throw new Error(ACTIONS_NOT_CONFIGURED);
  }

  async startReplication(): Promise<void> {
    throw new Error(ACTIONS_NOT_CONFIGURED);
  }
}
