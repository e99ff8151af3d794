import { MySQLCompatibilityCheck, MySQLInspector } from '../src/mysql-compat';
import { Schema, SchemaInspector } from '../src/schema-parity';
import { lines, signal } from './helpers';

const cleanSchema: Schema = {
  tables: [
    {
      name: 'orders',
      primaryKey: ['id'],
      columns: [
        { name: 'id', type: 'int', nullable: false },
        { name: 'note', type: 'text', nullable: true, charset: 'utf8mb4', collation: 'utf8mb4_0900_ai_ci' },
      ],
    },
  ],
};

function setup(sqlMode: string, features: string[], schema: Schema = cleanSchema) {
  const inspector: MySQLInspector = {
    sqlMode: jest.fn(async () => sqlMode),
    deprecatedFeaturesUsed: jest.fn(async () => features),
  };
  const schemaInspector: SchemaInspector = { schema: jest.fn(async () => schema) };
  return { inspector, schemaInspector };
}

const input = { sourceVersion: '5.7', targetVersion: '8.0', primaryHost: 'db-primary' };

describe('MySQLCompatibilityCheck', () => {
  it('should report a single INFO when nothing is risky', async () => {
    const check = new MySQLCompatibilityCheck(setup('STRICT_TRANS_TABLES,ONLY_FULL_GROUP_BY', []));

    expect(check.name).toBe('mysql_compat_57_80');
    expect(lines(await check.run(input, signal))).toEqual([
      'INFO no MySQL 5.7 → 8.0 compatibility risks detected',
    ]);
  });

  it('should warn when the plan is not a 5.7 → 8.0 upgrade', async () => {
    const check = new MySQLCompatibilityCheck(setup('', []));
    const findings = await check.run({ ...input, sourceVersion: '8.0', targetVersion: '8.4' }, signal);

    expect(lines(findings)).toEqual(['WARN compatibility check tuned for 5.7 → 8.0 upgrades']);
    expect(findings[0].meta).toEqual({ source_version: '8.0', target_version: '8.4' });
  });

  it('should flag removed sql modes and deprecated features', async () => {
    const check = new MySQLCompatibilityCheck(
      setup('strict_trans_tables, no_auto_create_user', ['query_cache'])
    );

    expect(lines(await check.run(input, signal))).toEqual([
      'WARN sql_mode includes deprecated mode "NO_AUTO_CREATE_USER" for 8.0',
      'BLOCK deprecated feature detected: "QUERY_CACHE"',
    ]);
  });

  it('should flag tables without primary keys and risky encodings', async () => {
    const schema: Schema = {
      tables: [
        {
          name: 'events',
          primaryKey: [],
          columns: [{ name: 'payload', type: 'text', nullable: true, charset: 'UTF8', collation: 'utf8_general_ci' }],
        },
      ],
    };
    const findings = await new MySQLCompatibilityCheck(setup('', [], schema)).run(input, signal);

    expect(lines(findings)).toEqual([
      'BLOCK table "events" missing primary key (CDC risk)',
      'WARN table "events" column "payload" uses risky charset "UTF8"',
      'WARN table "events" column "payload" uses risky collation "utf8_general_ci"',
    ]);
  });

  it('should honour custom lists', async () => {
    const check = new MySQLCompatibilityCheck({
      ...setup('ANSI_QUOTES', ['MYISAM_MERGE']),
      deprecatedSqlModes: ['ANSI_QUOTES'],
      deprecatedFeatures: [],
    });

    expect(lines(await check.run(input, signal))).toEqual([
      'WARN sql_mode includes deprecated mode "ANSI_QUOTES" for 8.0',
    ]);
  });

  it('should surface inspector failures as errors', async () => {
    const deps = setup('', []);
    deps.inspector.sqlMode = jest.fn(async () => {
      throw new Error('access denied');
    });

    await expect(new MySQLCompatibilityCheck(deps).run(input, signal)).rejects.toThrow(
      'failed to read sql_mode: access denied'
    );
  });

  it('should require a primary host', async () => {
    await expect(
      new MySQLCompatibilityCheck(setup('', [])).run({ sourceVersion: '5.7', targetVersion: '8.0' }, signal)
    ).rejects.toThrow('primary host is required');
  });
});
