/**
 * MySQL 5.7 → 8.0 Compatibility Check
 *
 * Reads server settings and the primary's schema and flags upgrade risks:
 * - sql_mode entries removed in 8.0 (WARN)
 * - deprecated features still in use (BLOCK)
 * - tables without a primary key, which CDC cannot key reliably (BLOCK)
 * - columns on risky charsets or collations (WARN)
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
import { SchemaInspector } from './schema-parity';

export interface MySQLInspector {
  /** Comma-separated sql_mode of the server */
  sqlMode(host: string, signal: AbortSignal): Promise<string>;
  deprecatedFeaturesUsed(host: string, signal: AbortSignal): Promise<string[]>;
}

export const DEFAULT_DEPRECATED_SQL_MODES: readonly string[] = [
  'NO_AUTO_CREATE_USER',
  'DB2',
  'MAXDB',
  'MSSQL',
  'MYSQL323',
  'MYSQL40',
  'ORACLE',
  'POSTGRESQL',
  'NO_FIELD_OPTIONS',
  'NO_KEY_OPTIONS',
  'NO_TABLE_OPTIONS',
];

export const DEFAULT_DEPRECATED_FEATURES: readonly string[] = [
  'QUERY_CACHE',
  'PASSWORD_FUNCTION',
  'ENCRYPT_FUNCTION',
  'DES_ENCRYPT',
  'GROUP_BY_IMPLICIT_SORT',
  'INNODB_FILE_FORMAT',
];

export const DEFAULT_RISKY_CHARSETS: readonly string[] = ['utf8', 'utf8mb3', 'ucs2'];

export const DEFAULT_RISKY_COLLATIONS: readonly string[] = [
  'utf8_general_ci',
  'utf8_unicode_ci',
  'utf8mb3_general_ci',
];

export interface MySQLCompatibilityCheckOptions {
  inspector: MySQLInspector;
  schemaInspector: SchemaInspector;
  /** Falls back to the check input's primary host */
  primaryHost?: string;
  deprecatedSqlModes?: readonly string[];
  deprecatedFeatures?: readonly string[];
  riskyCharsets?: readonly string[];
  riskyCollations?: readonly string[];
}

export class MySQLCompatibilityCheck implements Check {
  readonly name = CHECK_NAMES.MYSQL_COMPAT;
  readonly readOnly = true;
  private readonly inspector: MySQLInspector;
  private readonly schemaInspector: SchemaInspector;
  private readonly deprecatedSqlModes: readonly string[];
  private readonly deprecatedFeatures: readonly string[];
  private readonly riskyCharsets: readonly string[];
  private readonly riskyCollations: readonly string[];

  constructor(private readonly options: MySQLCompatibilityCheckOptions) {
    if (!options.inspector) {
      throw new ConfigurationError('mysql inspector is required');
    }
    if (!options.schemaInspector) {
      throw new ConfigurationError('schema inspector is required');
    }
    this.inspector = options.inspector;
    this.schemaInspector = options.schemaInspector;
    this.deprecatedSqlModes = options.deprecatedSqlModes ?? DEFAULT_DEPRECATED_SQL_MODES;
    this.deprecatedFeatures = options.deprecatedFeatures ?? DEFAULT_DEPRECATED_FEATURES;
    this.riskyCharsets = options.riskyCharsets ?? DEFAULT_RISKY_CHARSETS;
    this.riskyCollations = options.riskyCollations ?? DEFAULT_RISKY_COLLATIONS;
  }

  async run(input: CheckInput, signal: AbortSignal): Promise<Finding[]> {
    const host = (this.options.primaryHost ?? input.primaryHost ?? '').trim();
    if (host === '') {
      throw new Error('primary host is required');
    }

    const findings: Finding[] = [];
    const source = input.sourceVersion ?? '';
    const target = input.targetVersion ?? '';

    if ((source !== '' || target !== '') && (source !== '5.7' || target !== '8.0')) {
      findings.push(
        warn('compatibility check tuned for 5.7 → 8.0 upgrades', {
          source_version: source,
          target_version: target,
        })
      );
    }

    const sqlMode = await read('sql_mode', () => this.inspector.sqlMode(host, signal));
    const modes = upperSet(sqlMode.split(','));
    for (const mode of this.deprecatedSqlModes) {
      if (modes.has(mode.toUpperCase())) {
        findings.push(warn(`sql_mode includes deprecated mode "${mode}" for 8.0`, { mode }));
      }
    }

    const used = await read('deprecated features', () => this.inspector.deprecatedFeaturesUsed(host, signal));
    const usedSet = upperSet(used);
    for (const feature of this.deprecatedFeatures) {
      if (usedSet.has(feature.toUpperCase())) {
        findings.push(block(`deprecated feature detected: "${feature}"`, { feature }));
      }
    }

    const schema = await read('schema', () => this.schemaInspector.schema(host, signal));
    for (const table of schema.tables) {
      if (table.primaryKey.length === 0) {
        findings.push(block(`table "${table.name}" missing primary key (CDC risk)`, { table: table.name }));
      }
      for (const col of table.columns) {
        if (containsInsensitive(this.riskyCharsets, col.charset)) {
          findings.push(
            warn(`table "${table.name}" column "${col.name}" uses risky charset "${col.charset}"`, {
              table: table.name,
              column: col.name,
              charset: col.charset,
            })
          );
        }
        if (containsInsensitive(this.riskyCollations, col.collation)) {
          findings.push(
            warn(`table "${table.name}" column "${col.name}" uses risky collation "${col.collation}"`, {
              table: table.name,
              column: col.name,
              collation: col.collation,
            })
          );
        }
      }
    }

    if (findings.length === 0) {
      findings.push(info('no MySQL 5.7 → 8.0 compatibility risks detected'));
    }
    return findings;
  }
}

async function read<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new Error(`failed to read ${what}: ${errorMessage(error)}`);
  }
}

function upperSet(values: string[]): Set<string> {
  return new Set(values.map((v) => v.trim().toUpperCase()).filter((v) => v !== ''));
}

function containsInsensitive(list: readonly string[], value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const upper = value.toUpperCase();
  return list.some((item) => item.toUpperCase() === upper);
}
