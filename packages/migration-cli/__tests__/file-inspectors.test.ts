import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SchemaSnapshotSchema } from '../src/contracts';
import {
  ACTIONS_NOT_CONFIGURED,
  DebeziumFileInspector,
  KafkaFileInspector,
  MySQLFileInspector,
  SchemaFileInspector,
  SimulatedReplicaActions,
  StaticReplicaInspector,
  UnconfiguredReplicaActions,
  readJsonFile,
} from '../src/file-inspectors';
import { example } from './helpers';

describe('readJsonFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftgate-inspectors-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should name a missing file', () => {
    const filePath = path.join(tmpDir, 'absent.json');

    expect(() => readJsonFile(filePath, SchemaSnapshotSchema, 'schema')).toThrow(
      `cannot read schema file ${filePath}: `
    );
  });

  it('should reject malformed JSON', () => {
    const filePath = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(filePath, '{ "tables": [');

    expect(() => readJsonFile(filePath, SchemaSnapshotSchema, 'schema')).toThrow(
      `schema file ${filePath} is not valid JSON: `
    );
  });

  it('should list contract violations with their paths', () => {
    const filePath = path.join(tmpDir, 'schema.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({ tables: [{ name: 'orders', columns: [{ name: 'id', type: 'int' }] }] })
    );

    expect(() => readJsonFile(filePath, SchemaSnapshotSchema, 'schema')).toThrow(
      `schema file ${filePath} is invalid: tables.0.columns.0.nullable: Required`
    );
  });
});

describe('SchemaFileInspector', () => {
  const inspector = new SchemaFileInspector({
    primaryHost: 'db-primary',
    primaryPath: example('schema-primary.json'),
    replicaPath: example('schema-replica.json'),
  });

  it('should read the primary snapshot for the primary host', async () => {
    const schema = await inspector.schema('db-primary');

    expect(schema.tables.map((t) => t.name)).toEqual(['customers', 'orders']);
    expect(schema.tables[1].columns[2]).toEqual({
      name: 'status',
      type: 'varchar(32)',
      nullable: false,
      default: 'new',
      charset: 'utf8mb4',
      collation: 'utf8mb4_0900_ai_ci',
    });
  });

  it('should map a null default to no default', async () => {
    const schema = await inspector.schema('db-replica-7');

    expect(schema.tables[1].columns[3].default).toBeUndefined();
  });

  it('should require a snapshot for the requested host', async () => {
    const primaryOnly = new SchemaFileInspector({
      primaryHost: 'db-primary',
      primaryPath: example('schema-primary.json'),
    });

    await expect(primaryOnly.schema('db-replica-1')).rejects.toThrow(
      'schema file path required for host "db-replica-1"'
    );
  });
});

describe('DebeziumFileInspector', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shiftgate-debezium-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should convert the Kafka Connect status body', async () => {
    const status = await new DebeziumFileInspector(example('debezium-status.json')).connectorStatus(
      'orders-connector'
    );

    expect(status).toEqual({
      name: 'orders-connector',
      state: 'RUNNING',
      worker: 'connect-1:8083',
      tasks: [{ id: 0, state: 'RUNNING', worker: 'connect-1:8083' }],
      restartCount: 0,
    });
  });

  it('should fall back to the requested connector name and parse the last restart', async () => {
    const filePath = path.join(tmpDir, 'status.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        connector: { state: 'FAILED' },
        tasks: [{ id: 1, state: 'FAILED', trace: 'boom' }],
        restart_count: 4,
        last_restart_at: '2024-05-01T11:55:00Z',
      })
    );

    const status = await new DebeziumFileInspector(filePath).connectorStatus('orders-connector');

    expect(status.name).toBe('orders-connector');
    expect(status.tasks).toEqual([{ id: 1, state: 'FAILED', trace: 'boom' }]);
    expect(status.restartCount).toBe(4);
    expect(status.lastRestartAt).toEqual(new Date('2024-05-01T11:55:00Z'));
  });

  it('should require a status file', async () => {
    await expect(new DebeziumFileInspector().connectorStatus('orders-connector')).rejects.toThrow(
      'cdc status file path is required'
    );
  });
});

describe('KafkaFileInspector', () => {
  const inspector = new KafkaFileInspector(example('schema-history.json'));

  it('should answer from the topics map', async () => {
    expect(await inspector.topicExists('schema-history.orders')).toBe(true);
    expect(await inspector.topicExists('schema-history.billing')).toBe(false);
    expect(await inspector.topicReadable('schema-history.orders')).toBe(true);
    expect(await inspector.topicReadable('schema-history.billing')).toBe(false);
    expect(await inspector.schemaHistoryTables('schema-history.orders')).toEqual([
      'shop.customers',
      'shop.orders',
    ]);
  });

  it('should not report a topic inherited from the object prototype', async () => {
    expect(await inspector.topicExists('constructor')).toBe(false);
  });

  it('should reject coverage reads for unknown topics', async () => {
    await expect(inspector.schemaHistoryTables('schema-history.billing')).rejects.toThrow(
      'topic "schema-history.billing" not present in schema history file'
    );
  });
});

describe('MySQLFileInspector', () => {
  it('should read sql_mode and deprecated features', async () => {
    const inspector = new MySQLFileInspector(example('mysql-settings.json'));

    expect(await inspector.sqlMode()).toBe('STRICT_TRANS_TABLES,ERROR_FOR_DIVISION_BY_ZERO,NO_ENGINE_SUBSTITUTION');
    expect(await inspector.deprecatedFeaturesUsed()).toEqual([]);
  });
});

describe('replica backends', () => {
  it('should identify the primary and report the configured thread state', async () => {
    const inspector = new StaticReplicaInspector('db-primary', { ioThreadRunning: true, sqlThreadRunning: false });

    expect(await inspector.isPrimary('db-primary')).toBe(true);
    expect(await inspector.isPrimary('db-replica-1')).toBe(false);
    expect(await inspector.replicationStatus()).toEqual({ ioThreadRunning: true, sqlThreadRunning: false });
  });

  it('should record simulated actions in order', async () => {
    const actions = new SimulatedReplicaActions();

    await actions.stopReplication('db-replica-1');
    await actions.runUpgrade('db-replica-1');
    await actions.startReplication('db-replica-1');

    expect(actions.performed).toEqual(['stop:db-replica-1', 'upgrade:db-replica-1', 'start:db-replica-1']);
  });

  it('should refuse to act without a configured backend', async () => {
    await expect(new UnconfiguredReplicaActions().stopReplication()).rejects.toThrow(ACTIONS_NOT_CONFIGURED);
  });
});
