/**
 * Tests for the findings model: severity ordering, immutability and
 * summary aggregation
 */

import {
  Severity,
  ResultAggregator,
  block,
  createFinding,
  formatSeverity,
  hasBlock,
  info,
  isClean,
  mergeSummaries,
  summarize,
  warn,
  withMeta,
} from '../src/findings';

describe('Findings', () => {
  describe('Severity', () => {
    it('should order INFO < WARN < BLOCK', () => {
      expect(Severity.Info).toBeLessThan(Severity.Warn);
      expect(Severity.Warn).toBeLessThan(Severity.Block);
    });

    it('should render labels', () => {
      expect(formatSeverity(Severity.Info)).toBe('INFO');
      expect(formatSeverity(Severity.Warn)).toBe('WARN');
      expect(formatSeverity(Severity.Block)).toBe('BLOCK');
    });
  });

  describe('createFinding', () => {
    it('should freeze the finding and a copy of its metadata', () => {
      const meta: Record<string, unknown> = { table: 'orders' };
      const finding = createFinding(Severity.Warn, 'drift', meta);
      meta.table = 'changed';

      expect(finding.meta.table).toBe('orders');
      expect(Object.isFrozen(finding)).toBe(true);
      expect(Object.isFrozen(finding.meta)).toBe(true);
    });

    it('should keep existing metadata keys when adding defaults', () => {
      const finding = withMeta(warn('w', { check: 'own' }), { check: 'default', step: 'preflight' });

      expect(finding.meta).toEqual({ check: 'own', step: 'preflight' });
    });
  });

  describe('summaries', () => {
    const findings = [info('a'), warn('b'), block('c'), info('d'), block('e')];

    it('should count by severity', () => {
      expect(summarize(findings)).toEqual({ info: 2, warn: 1, block: 2 });
    });

    it('should produce the same totals for any order or partition', () => {
      const reversed = summarize([...findings].reverse());
      const merged = mergeSummaries(summarize(findings.slice(3)), summarize(findings.slice(0, 3)));

      expect(reversed).toEqual({ info: 2, warn: 1, block: 2 });
      expect(merged).toEqual(reversed);
    });

    it('should report block and cleanliness', () => {
      expect(hasBlock(findings)).toBe(true);
      expect(hasBlock([info('x'), warn('y')])).toBe(false);
      expect(isClean({ info: 4, warn: 0, block: 0 })).toBe(true);
      expect(isClean({ info: 0, warn: 1, block: 0 })).toBe(false);
    });
  });

  describe('ResultAggregator', () => {
    it('should stay blocked once a BLOCK was added', () => {
      const aggregator = new ResultAggregator();

      expect(aggregator.addFindings([info('ok')])).toBe(true);
      expect(aggregator.addFindings([warn('careful')])).toBe(true);
      expect(aggregator.addFindings([block('stop')])).toBe(false);
      expect(aggregator.addFindings([info('later')])).toBe(false);
      expect(aggregator.getSummary()).toEqual({ info: 2, warn: 1, block: 1 });
    });
  });
});
