/**
 * Schema Parity
 *
 * Compares primary and replica schema snapshots table by table.
 *
 * Severity rules:
 * - table missing on replica, primary key lost or changed, column missing,
 *   column type changed: BLOCK
 * - extra table or column on replica, primary key only on replica,
 *   nullability/default/collation drift: WARN
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
  warn,
} from '@shiftgate/migration-engine';

export interface Column {
  name: string;
  type: string;
  nullable: boolean;
  /** Absent means no default; an empty string is a real default */
  default?: string;
  charset?: string;
  collation?: string;
}

export interface Table {
  name: string;
  columns: Column[];
  /** Ordered column names */
  primaryKey: string[];
}

export interface Schema {
  tables: Table[];
}

export interface SchemaInspector {
  schema(host: string, signal: AbortSignal): Promise<Schema>;
}

/**
 * Diff two snapshots. A healthy pair yields an empty list.
 *
 * Findings follow primary table order, then extra replica tables in replica
 * order.
 */
export function compareSchemas(primary: Schema, replica: Schema): Finding[] {
  const findings: Finding[] = [];
  const primaryTables = indexByName(primary.tables);
  const replicaTables = indexByName(replica.tables);

  for (const [name, primaryTable] of primaryTables) {
    const replicaTable = replicaTables.get(name);
    if (!replicaTable) {
      findings.push(block(`table "${name}" missing on replica`, { table: name }));
      continue;
    }
    findings.push(...comparePrimaryKey(name, primaryTable.primaryKey, replicaTable.primaryKey));
    findings.push(...compareColumns(name, primaryTable.columns, replicaTable.columns));
  }

  for (const name of replicaTables.keys()) {
    if (!primaryTables.has(name)) {
      findings.push(warn(`extra table "${name}" exists on replica`, { table: name }));
    }
  }

  return findings;
}

function comparePrimaryKey(table: string, primaryPk: string[], replicaPk: string[]): Finding[] {
  if (primaryPk.length === 0 && replicaPk.length === 0) {
    return [];
  }
  if (primaryPk.length === 0) {
    return [warn(`table "${table}" has primary key on replica but not on primary`, { table })];
  }
  if (replicaPk.length === 0) {
    return [block(`table "${table}" missing primary key on replica`, { table })];
  }
  if (!sameOrder(primaryPk, replicaPk)) {
    return [
      block(`table "${table}" primary key mismatch`, {
        table,
        primary_pk: [...primaryPk],
        replica_pk: [...replicaPk],
      }),
    ];
  }
  return [];
}

function compareColumns(table: string, primaryCols: Column[], replicaCols: Column[]): Finding[] {
  const findings: Finding[] = [];
  const primaryIndex = indexByName(primaryCols);
  const replicaIndex = indexByName(replicaCols);

  for (const [column, p] of primaryIndex) {
    const r = replicaIndex.get(column);
    if (!r) {
      findings.push(block(`table "${table}" column "${column}" missing on replica`, { table, column }));
      continue;
    }

    if (p.type !== r.type) {
      findings.push(
        block(`table "${table}" column "${column}" type mismatch`, {
          table,
          column,
          primary_type: p.type,
          replica_type: r.type,
        })
      );
    }
    if (p.nullable !== r.nullable) {
      findings.push(
        warn(`table "${table}" column "${column}" nullability differs`, {
          table,
          column,
          primary_nullable: p.nullable,
          replica_nullable: r.nullable,
        })
      );
    }
    if (p.default !== r.default) {
      findings.push(
        warn(`table "${table}" column "${column}" default differs`, {
          table,
          column,
          primary_default: p.default ?? null,
          replica_default: r.default ?? null,
        })
      );
    }
    if ((p.collation ?? '') !== (r.collation ?? '')) {
      findings.push(
        warn(`table "${table}" column "${column}" collation differs`, {
          table,
          column,
          primary_collation: p.collation ?? '',
          replica_collation: r.collation ?? '',
        })
      );
    }
  }

  for (const column of replicaIndex.keys()) {
    if (!primaryIndex.has(column)) {
      findings.push(warn(`table "${table}" has extra column "${column}" on replica`, { table, column }));
    }
  }

  return findings;
}

function indexByName<T extends { name: string }>(items: T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of items) {
    index.set(item.name, item);
  }
  return index;
}

function sameOrder(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

export interface SchemaParityCheckOptions {
  inspector: SchemaInspector;
  /** Falls back to the check input's primary host */
  primaryHost?: string;
  /** Falls back to the check input's replica host */
  replicaHost?: string;
}

/**
 * Read-only check reading both snapshots through a SchemaInspector.
 * Inspector failures propagate so the checks runner reports them as BLOCK.
 */
export class SchemaParityCheck implements Check {
  readonly name = CHECK_NAMES.SCHEMA_PARITY;
  readonly readOnly = true;
  private readonly inspector: SchemaInspector;

  constructor(private readonly options: SchemaParityCheckOptions) {
    if (!options.inspector) {
      throw new ConfigurationError('schema inspector is required');
    }
    this.inspector = options.inspector;
  }

  async run(input: CheckInput, signal: AbortSignal): Promise<Finding[]> {
    const primaryHost = (this.options.primaryHost ?? input.primaryHost ?? '').trim();
    const replicaHost = (this.options.replicaHost ?? input.replicaHost ?? '').trim();
    if (primaryHost === '' || replicaHost === '') {
      throw new Error('primary and replica hosts are required');
    }

    const primary = await this.readSchema('primary', primaryHost, signal);
    const replica = await this.readSchema('replica', replicaHost, signal);

    const findings = compareSchemas(primary, replica);
    if (findings.length === 0) {
      return [info('schema parity verified', { primary: primaryHost, replica: replicaHost })];
    }
    return findings;
  }

  private async readSchema(role: 'primary' | 'replica', host: string, signal: AbortSignal): Promise<Schema> {
    try {
      return await this.inspector.schema(host, signal);
    } catch (error) {
      throw new Error(`failed to read ${role} schema: ${errorMessage(error)}`);
    }
  }
}
