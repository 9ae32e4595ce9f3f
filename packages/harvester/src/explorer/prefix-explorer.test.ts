import { describe, it, expect } from 'vitest';
import { HarvestMetrics } from '../observability/metrics.js';
import { ResultStore } from '../pipeline/result-store.js';
import type { SuggestFn, SuggestQuery } from '../suggest/types.js';
import { AlphabetPruner } from './alphabet-pruner.js';
import { HOUSE_NUMBER_SEEDS } from './alphabets.js';
import { PrefixExplorer } from './prefix-explorer.js';
import { HouseNumberScope, StreetScope } from './scopes.js';

type Answer = string[] | 'fail';

function makeSuggest(answers: Record<string, Answer>) {
  const calls: SuggestQuery[] = [];

  const suggest: SuggestFn = async (query) => {
    calls.push(query);
    const answer = answers[query.prefix];

    if (answer === 'fail') {
      return { success: false, error: 'socket hang up', errorCode: 'network' };
    }

    return { success: true, suggestions: answer ?? [] };
  };

  return { suggest, calls };
}

function streetsFor(prefix: string, count: number): string[] {
  return Array.from(
    { length: count },
    (_, index) => `${prefix}weg ${index + 1}`,
  );
}

describe('PrefixExplorer', () => {
  it('completes a prefix that returns fewer results than the threshold', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ A: streetsFor('A', 5) });
    const explorer = new PrefixExplorer(suggest);

    const outcome = await explorer.explore(new StreetScope(store), 'A');

    expect(calls).toEqual([{ kind: 'street', prefix: 'A' }]);
    expect(store.isQueryCompleted('A')).toBe(true);
    expect(store.streetCount).toBe(5);
    expect(outcome).toEqual({
      queries: 1,
      completed: 1,
      expanded: 0,
      failed: 0,
      discovered: 5,
    });
  });

  it('queries one child per pruned symbol when the page is full', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ Ab: streetsFor('Ab', 12) });
    const explorer = new PrefixExplorer(suggest);

    await explorer.explore(new StreetScope(store), 'Ab');

    const children = new AlphabetPruner()
      .nextSymbols('Ab')
      .map((symbol) => `Ab${symbol}`);
    expect(calls.map((call) => call.prefix)).toEqual(['Ab', ...children]);
    expect(children).toHaveLength(17);
    expect(children).not.toContain('Abb');
    expect(children).not.toContain('Abz');
    expect(store.isQueryCompleted('Ab')).toBe(false);
    expect(store.isQueryCompleted('Aba')).toBe(true);
    expect(store.streetCount).toBe(12);
  });

  it('resolves a whole subtree before starting its next sibling', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({
      A: streetsFor('A', 12),
      Aa: streetsFor('Aa', 12),
    });
    const explorer = new PrefixExplorer(suggest);

    await explorer.explore(new StreetScope(store), 'A');

    const prefixes = calls.map((call) => call.prefix);
    expect(prefixes[0]).toBe('A');
    expect(prefixes[1]).toBe('Aa');
    expect(prefixes[2]).toBe('Aaa');
    expect(prefixes[31]).toBe('Aaß');
    expect(prefixes[32]).toBe('Ab');
    expect(prefixes).toHaveLength(1 + 30 + 30);
  });

  it('does not query a completed prefix again', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ B: streetsFor('B', 3) });
    const explorer = new PrefixExplorer(suggest);
    const scope = new StreetScope(store);

    await explorer.explore(scope, 'B');
    const second = await explorer.explore(scope, 'B');

    expect(calls).toHaveLength(1);
    expect(second.queries).toBe(0);
    expect(store.streetCount).toBe(3);
  });

  it('skips a letter that a previous run completed', async () => {
    const store = new ResultStore();
    store.mergeStreets(streetsFor('A', 5));
    store.markQueryCompleted('A');
    const { suggest, calls } = makeSuggest({ A: streetsFor('A', 12) });
    const explorer = new PrefixExplorer(suggest);

    const outcome = await explorer.explore(new StreetScope(store), 'A');

    expect(calls).toHaveLength(0);
    expect(outcome.queries).toBe(0);
    expect(store.sortedStreets()).toEqual(streetsFor('A', 5).sort());
  });

  it('never shrinks the discovered set', async () => {
    const store = new ResultStore();
    const { suggest } = makeSuggest({
      C: ['Calwer Straße', 'Charlottenplatz'],
      D: ['Calwer Straße'],
      E: [],
    });
    const explorer = new PrefixExplorer(suggest);
    const scope = new StreetScope(store);
    const sizes: number[] = [];

    for (const prefix of ['C', 'D', 'E', 'C']) {
      await explorer.explore(scope, prefix);
      sizes.push(scope.discoveredCount);
    }

    expect(sizes).toEqual([2, 2, 2, 2]);
  });

  it('records a failed query without completing or expanding it', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ F: 'fail' });
    const explorer = new PrefixExplorer(suggest);

    const outcome = await explorer.explore(new StreetScope(store), 'F');

    expect(calls).toHaveLength(1);
    expect(outcome.failed).toBe(1);
    expect(store.isQueryCompleted('F')).toBe(false);
    expect(store.isQueryFailed('F')).toBe(true);
  });

  it('clears the failure once the prefix answers', async () => {
    const store = new ResultStore();
    const scope = new StreetScope(store);

    await new PrefixExplorer(makeSuggest({ F: 'fail' }).suggest).explore(
      scope,
      'F',
    );
    await new PrefixExplorer(
      makeSuggest({ F: ['Fritz-Elsas-Straße'] }).suggest,
    ).explore(scope, 'F');

    expect(store.isQueryFailed('F')).toBe(false);
    expect(store.isQueryCompleted('F')).toBe(true);
    expect(store.sortedStreets()).toEqual(['Fritz-Elsas-Straße']);
  });

  it('keeps exploring siblings after a failed child', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({
      Ab: streetsFor('Ab', 12),
      Aba: 'fail',
    });
    const explorer = new PrefixExplorer(suggest);

    const outcome = await explorer.explore(new StreetScope(store), 'Ab');

    expect(calls).toHaveLength(18);
    expect(outcome.failed).toBe(1);
    expect(outcome.completed).toBe(16);
    expect(store.isQueryFailed('Aba')).toBe(true);
    expect(store.isQueryCompleted('Abe')).toBe(true);
  });

  it('expands house numbers over digits under one street', async () => {
    const store = new ResultStore();
    const full = ['1', '1a', '10', '11', '12', '13', '14', '15', '16', '17'];
    full.push('18', '19');
    const { suggest, calls } = makeSuggest({ '1': full, '10': ['10'] });
    const explorer = new PrefixExplorer(suggest);
    const scope = new HouseNumberScope(store, 'Königstraße');

    await explorer.explore(scope, '1');

    expect(calls[0]).toEqual({
      kind: 'house-number',
      street: 'Königstraße',
      prefix: '1',
    });
    expect(calls.slice(1).map((call) => call.prefix)).toEqual([
      '10',
      '11',
      '12',
      '13',
      '14',
      '15',
      '16',
      '17',
      '18',
      '19',
    ]);
    expect(scope.discoveredCount).toBe(12);
    expect(store.isQueryCompleted('Königstraße#10')).toBe(true);
    expect(store.isQueryCompleted('Königstraße#1')).toBe(false);
    expect(store.isStreetProcessed('Königstraße')).toBe(false);
  });

  it('explores every seed with exploreAll and sums the outcomes', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ '2': ['2'], '4': ['4', '4a'] });
    const explorer = new PrefixExplorer(suggest);
    const scope = new HouseNumberScope(store, 'Marktplatz');

    const outcome = await explorer.exploreAll(scope, HOUSE_NUMBER_SEEDS);

    expect(calls.map((call) => call.prefix)).toEqual([
      '1',
      '2',
      '3',
      '4',
      '5',
      '6',
      '7',
      '8',
      '9',
    ]);
    expect(outcome).toEqual({
      queries: 9,
      completed: 9,
      expanded: 0,
      failed: 0,
      discovered: 3,
    });
    expect(scope.commit()).toBe(3);
    expect(store.houseNumbersOf('Marktplatz')).toEqual(['2', '4', '4a']);
  });

  it('honours a custom truncation threshold', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ '7': ['7', '70', '71'] });
    const explorer = new PrefixExplorer(suggest, { truncationThreshold: 3 });

    await explorer.explore(new HouseNumberScope(store, 'Schloßplatz'), '7');

    expect(calls).toHaveLength(11);
  });

  it('completes a prefix whose page is not exactly the threshold', async () => {
    const store = new ResultStore();
    const { suggest, calls } = makeSuggest({ A: streetsFor('A', 13) });
    const explorer = new PrefixExplorer(suggest);

    const outcome = await explorer.explore(new StreetScope(store), 'A');

    expect(calls).toHaveLength(1);
    expect(outcome.expanded).toBe(0);
    expect(store.isQueryCompleted('A')).toBe(true);
    expect(store.streetCount).toBe(13);
  });

  it('feeds query counters into metrics', async () => {
    const store = new ResultStore();
    const metrics = new HarvestMetrics();
    const { suggest } = makeSuggest({ Ab: streetsFor('Ab', 12), Abe: 'fail' });
    const explorer = new PrefixExplorer(suggest, undefined, metrics);

    await explorer.explore(new StreetScope(store), 'Ab');

    expect(metrics.count('queries.total')).toBe(18);
    expect(metrics.count('queries.failed')).toBe(1);
    expect(metrics.count('prefixes.expanded')).toBe(1);
    expect(metrics.count('prefixes.completed')).toBe(16);
    expect(metrics.snapshot().durations.count).toBe(18);
  });
});
