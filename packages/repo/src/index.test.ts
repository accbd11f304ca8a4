import { describe, it, expect } from 'vitest';
import {
  BudgetEnforcer,
  FileCollector,
  MemoryFileSource,
  PathMatcher,
  TreeAggregator,
  createEstimator,
  name,
} from './index';

describe('@repodump/repo', () => {
  it('exports its package name', () => {
    expect(name).toBe('@repodump/repo');
  });

  it('collects, enforces and aggregates a small tree end to end', () => {
    const source = new MemoryFileSource({
      'README.md': 'r'.repeat(20),
      'a/node_modules/x.js': 'module.exports = 1;',
      'src/big.ts': 'b'.repeat(400),
      'src/small.ts': 's'.repeat(8),
    });
    const estimator = createEstimator();

    const collected = new FileCollector(source, { estimator }).collect(PathMatcher.create({ exclude: ['node_modules'] }));
    const enforced = new BudgetEnforcer(estimator).enforce(collected.records, { maxTokens: 20 });
    const root = new TreeAggregator().build(enforced.records);

    expect(enforced.records.map((r) => [r.path, r.status, r.tokenCount])).toEqual([
      ['README.md', 'Included', 5],
      ['src/big.ts', 'Truncated', 13],
      ['src/small.ts', 'Included', 2],
    ]);
    expect(enforced.totalTokens).toBe(20);
    expect(root.aggregateTokens).toBe(20);
    expect(root.entries.map((e) => e.name)).toEqual(['src', 'README.md']);
  });
});
