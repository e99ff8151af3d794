/**
 * Snapshot File Contracts
 *
 * Shapes of the JSON snapshot files the CLI reads in place of live
 * database, Kafka Connect and broker access. Every file is validated before
 * it reaches a check.
 */

import { z } from 'zod';
import type { ConnectorStatus, Schema } from '@shiftgate/migration-checks';

// ========================================
// Schema Snapshot
// ========================================

export const ColumnSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().min(1),
    nullable: z.boolean(),
    default: z.string().nullable().optional(),
    charset: z.string().optional(),
    collation: z.string().optional(),
  })
  .strict();

export const TableSchema = z
  .object({
    name: z.string().min(1),
    primaryKey: z.array(z.string()).default([]),
    columns: z.array(ColumnSchema),
  })
  .strict();

export const SchemaSnapshotSchema = z
  .object({
    tables: z.array(TableSchema),
  })
  .strict();

export type SchemaSnapshot = z.infer<typeof SchemaSnapshotSchema>;

/**
 * A null default means the column has none
 */
export function toSchema(snapshot: SchemaSnapshot): Schema {
  return {
    tables: snapshot.tables.map((t) => ({
      name: t.name,
      primaryKey: t.primaryKey,
      columns: t.columns.map((c) => ({
        name: c.name,
        type: c.type,
        nullable: c.nullable,
        default: c.default ?? undefined,
        charset: c.charset,
        collation: c.collation,
      })),
    })),
  };
}

// ========================================
// Debezium Connector Status
// ========================================

/**
 * Kafka Connect `GET /connectors/{name}/status` body, extended with the
 * restart counters the connector's monitoring records
 */
export const ConnectorStatusFileSchema = z.object({
  name: z.string().default(''),
  connector: z.object({
    state: z.string().min(1),
    worker_id: z.string().optional(),
  }),
  tasks: z
    .array(
      z.object({
        id: z.number().int().nonnegative(),
        state: z.string().min(1),
        worker_id: z.string().optional(),
        trace: z.string().optional(),
      })
    )
    .default([]),
  restart_count: z.number().int().nonnegative().default(0),
  last_restart_at: z.string().datetime({ offset: true }).optional(),
});

export type ConnectorStatusFile = z.infer<typeof ConnectorStatusFileSchema>;

export function toConnectorStatus(file: ConnectorStatusFile, connector: string): ConnectorStatus {
  return {
    name: file.name || connector,
    state: file.connector.state,
    worker: file.connector.worker_id,
    tasks: file.tasks.map((t) => ({ id: t.id, state: t.state, worker: t.worker_id, trace: t.trace })),
    restartCount: file.restart_count,
    lastRestartAt: file.last_restart_at ? new Date(file.last_restart_at) : undefined,
  };
}

// ========================================
// Schema History Topics
// ========================================

export const SchemaHistoryFileSchema = z.object({
  topics: z.record(
    z.object({
      readable: z.boolean(),
      tables: z.array(z.string()).default([]),
    })
  ),
});

export type SchemaHistoryFile = z.infer<typeof SchemaHistoryFileSchema>;

// ========================================
// MySQL Server Settings
// ========================================

export const MySQLSettingsFileSchema = z
  .object({
    sql_mode: z.string(),
    deprecated_features: z.array(z.string()).default([]),
  })
  .strict();

export type MySQLSettingsFile = z.infer<typeof MySQLSettingsFileSchema>;
