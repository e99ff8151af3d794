/**
 * Tests for the promotion gate: confirmation, required checks and strictly
 * clean re-validation
 */

import { readOnlyCheck } from '../src/checks-runner';
import { ConfigurationError } from '../src/errors';
import { Severity, info, warn } from '../src/findings';
import { PromotionGate } from '../src/promotion-gate';
import { silentLogger } from './helpers';

describe('PromotionGate', () => {
  const logger = silentLogger();
  const input = { primaryHost: 'db-primary', cdcConnector: 'orders-connector' };

  function healthyChecks() {
    const cdc = jest.fn(async () => [info('connector "orders-connector" and tasks are RUNNING')]);
    const parity = jest.fn(async () => [info('schema parity verified')]);
    return {
      cdc,
      parity,
      checks: [readOnlyCheck('cdc_debezium_health', cdc), readOnlyCheck('schema_parity', parity)],
    };
  }

  it('should reject a blank confirmation phrase', () => {
    expect(() => new PromotionGate({ checks: [], confirmationPhrase: ' ', logger })).toThrow(ConfigurationError);
  });

  it('should block on a confirmation mismatch without running checks', async () => {
    const { cdc, parity, checks } = healthyChecks();
    const gate = new PromotionGate({ checks, logger });

    const result = await gate.run(input, 'promote');

    expect(result.summary).toEqual({ info: 0, warn: 0, block: 1 });
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0].message).toBe('promotion requires explicit confirmation');
    expect(result.findings[0].meta).toEqual({ required: 'PROMOTE' });
    expect(cdc).not.toHaveBeenCalled();
    expect(parity).not.toHaveBeenCalled();
  });

  it('should block when required checks are missing', async () => {
    const compat = jest.fn(async () => [info('fine')]);
    const gate = new PromotionGate({ checks: [readOnlyCheck('mysql_compat_57_80', compat)], logger });

    const result = await gate.run(input, 'PROMOTE');

    expect(result.summary).toEqual({ info: 0, warn: 0, block: 1 });
    expect(result.findings.map((f) => f.message)).toEqual([
      'promotion requires checks: cdc_debezium_health, schema_parity',
    ]);
    expect(result.findings[0].meta).toEqual({ missing: ['cdc_debezium_health', 'schema_parity'] });
    expect(compat).not.toHaveBeenCalled();
  });

  it('should honour a custom phrase and required set', async () => {
    const compat = jest.fn(async () => [info('fine')]);
    const gate = new PromotionGate({
      checks: [readOnlyCheck('mysql_compat_57_80', compat)],
      requiredCheckNames: ['mysql_compat_57_80'],
      confirmationPhrase: 'yes, promote db-replica-1',
      logger,
    });

    const result = await gate.run(input, 'yes, promote db-replica-1');

    expect(result.summary).toEqual({ info: 1, warn: 0, block: 0 });
  });

  it('should pass when every finding is INFO', async () => {
    const { checks } = healthyChecks();
    const result = await new PromotionGate({ checks, logger }).run(input, 'PROMOTE');

    expect(result.summary).toEqual({ info: 2, warn: 0, block: 0 });
    expect(result.findings.map((f) => f.meta.check)).toEqual(['cdc_debezium_health', 'schema_parity']);
  });

  it('should block promotion on a single WARN', async () => {
    const gate = new PromotionGate({
      checks: [
        readOnlyCheck('cdc_debezium_health', () => [info('healthy')]),
        readOnlyCheck('schema_parity', () => [warn('column "a" nullability differs', { check: 'custom' })]),
      ],
      logger,
    });

    const result = await gate.run(input, 'PROMOTE');

    expect(result.summary).toEqual({ info: 1, warn: 1, block: 1 });
    expect(result.findings[1].meta).toEqual({ check: 'custom' });
    const last = result.findings[result.findings.length - 1];
    expect(last.severity).toBe(Severity.Block);
    expect(last.message).toBe('promotion blocked due to WARN/BLOCK findings (WARN=1, BLOCK=0)');
    expect(last.meta).toEqual({ warn: 1, block: 0 });
  });
});
