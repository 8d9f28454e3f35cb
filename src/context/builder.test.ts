import { describe, it, expect, beforeEach } from '@jest/globals';
import { ContextBuilder, TRUNCATION_MARKER, itemCost, serializeStageData } from './builder.js';
import { renderContext } from './render.js';
import { MemoryManager } from '../memory/manager.js';
import { InMemoryRecordStore } from '../storage/record-store.js';
import type { EntityMemory, PatternStat } from '../schemas/index.js';

describe('ContextBuilder', () => {
  let memory: MemoryManager;

  beforeEach(() => {
    memory = new MemoryManager({
      entities: new InMemoryRecordStore<EntityMemory>(),
      patterns: new InMemoryRecordStore<PatternStat>(),
      clock: () => new Date('2026-01-02T10:00:00.000Z'),
    });
  });

  const discovery = { stage: 'discovery', data: { name: 'Acme' } };
  const structure = { stage: 'structure', data: 'flat' };

  it('includes every source when the budget allows', async () => {
    await memory.rememberLongTerm('acme', { key: 'size', value: 'large' });
    await memory.recordOutcome('acme', 'roles', { success: true, durationMs: 2000 });
    const builder = new ContextBuilder({ memory, budgetChars: 1000 });

    const bundle = await builder.build('acme', 'roles', [discovery, structure]);

    expect(bundle.currentRun).toEqual([
      { source: 'current-run', label: 'discovery', text: '{"name":"Acme"}' },
      { source: 'current-run', label: 'structure', text: 'flat' },
    ]);
    expect(bundle.facts).toEqual([{ source: 'fact', label: 'size', text: 'large' }]);
    expect(bundle.hints).toEqual([
      {
        source: 'hint',
        label: 'pattern',
        text: 'roles (large): 1/1 runs succeeded (100%), avg 2.0s',
      },
    ]);
    expect(bundle.usedChars).toBe(26 + 15 + 11 + 59);
    expect(bundle.truncated).toBe(false);
  });

  it('prefers the latest stage result and gives facts what remains', async () => {
    await memory.rememberLongTerm('acme', { key: 'size', value: 'large' });
    const builder = new ContextBuilder({ memory, budgetChars: 30 });

    const bundle = await builder.build('acme', 'roles', [discovery, structure]);

    expect(bundle.currentRun.map((item) => item.label)).toEqual(['structure']);
    expect(bundle.facts.map((item) => item.label)).toEqual(['size']);
    expect(bundle.usedChars).toBe(26);
  });

  it('truncates an oversized result when enough room remains', async () => {
    await memory.rememberLongTerm('acme', { key: 'size', value: 'large' });
    const builder = new ContextBuilder({ memory, budgetChars: 200 });

    const bundle = await builder.build('acme', 'roles', [
      discovery,
      { stage: 'structure', data: 'x'.repeat(300) },
    ]);

    expect(bundle.currentRun).toHaveLength(1);
    expect(bundle.currentRun[0].text).toBe('x'.repeat(177) + TRUNCATION_MARKER);
    expect(bundle.truncated).toBe(true);
    expect(bundle.facts).toEqual([]);
    expect(bundle.usedChars).toBe(200);
  });

  it('drops an oversized result when little room remains', async () => {
    const builder = new ContextBuilder({ memory, budgetChars: 50 });

    const bundle = await builder.build('acme', 'roles', [
      { stage: 'structure', data: 'x'.repeat(100) },
    ]);

    expect(bundle.currentRun).toEqual([]);
    expect(bundle.truncated).toBe(false);
  });

  it('never exceeds its budget', async () => {
    for (let i = 0; i < 20; i++) {
      await memory.rememberLongTerm('acme', { key: `fact_${i}`, value: 'v'.repeat(i * 3) });
    }
    const builder = new ContextBuilder({ memory, budgetChars: 250 });

    const bundle = await builder.build('acme', 'verification', [discovery, structure]);
    const total = [...bundle.currentRun, ...bundle.facts, ...bundle.hints].reduce(
      (sum, item) => sum + itemCost(item),
      0
    );

    expect(total).toBe(bundle.usedChars);
    expect(total).toBeLessThanOrEqual(250);
  });

  it('caps facts at the recall limit', async () => {
    await memory.rememberLongTerm('acme', [
      { key: 'a', value: 1 },
      { key: 'b', value: 2 },
      { key: 'c', value: 3 },
    ]);
    const builder = new ContextBuilder({ memory, budgetChars: 1000, recallLimit: 2 });

    const bundle = await builder.build('acme', 'roles', []);

    expect(bundle.facts.map((item) => item.label)).toEqual(['a', 'b']);
  });
});

describe('serializeStageData', () => {
  it('passes strings through and JSON-encodes the rest', () => {
    expect(serializeStageData('text')).toBe('text');
    expect(serializeStageData({ a: 1 })).toBe('{"a":1}');
    expect(serializeStageData(undefined)).toBe('null');
  });
});

describe('renderContext', () => {
  it('renders non-empty sections', () => {
    const text = renderContext({
      entityKey: 'acme',
      stage: 'roles',
      currentRun: [{ source: 'current-run', label: 'structure', text: 'flat' }],
      facts: [],
      hints: [{ source: 'hint', label: 'pattern', text: 'roles (small): 1/1 runs succeeded' }],
      usedChars: 0,
      budgetChars: 100,
      truncated: false,
    });

    expect(text).toBe(
      '[CURRENT RUN]\nstructure: flat\n\n[PATTERN HINTS]\npattern: roles (small): 1/1 runs succeeded'
    );
  });
});
