import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryManager, NOTABLE_EVENTS_KEY } from './manager.js';
import { InMemoryRecordStore } from '../storage/record-store.js';
import {
  EntityMemorySchema,
  PatternStatSchema,
  type EntityMemory,
  type PatternStat,
} from '../schemas/index.js';

describe('MemoryManager', () => {
  let entities: InMemoryRecordStore<EntityMemory>;
  let patterns: InMemoryRecordStore<PatternStat>;
  let now: Date;
  let manager: MemoryManager;

  beforeEach(() => {
    entities = new InMemoryRecordStore(EntityMemorySchema);
    patterns = new InMemoryRecordStore(PatternStatSchema);
    now = new Date('2026-01-02T10:00:00.000Z');
    manager = new MemoryManager({
      entities,
      patterns,
      settings: { workingMemoryLimit: 3, promoteThreshold: 8 },
      clock: () => now,
    });
  });

  describe('working tier lifecycle', () => {
    it('caps the working tier at its limit', () => {
      manager.beginRun('exec-1', 'acme');
      for (let i = 1; i <= 5; i++) {
        manager.rememberWorking(`event-${i}`, {}, i);
      }

      expect(manager.workingEntries().map((entry) => entry.eventType)).toEqual([
        'event-3',
        'event-4',
        'event-5',
      ]);
    });

    it('promotes only notable entries at run end', async () => {
      manager.beginRun('exec-1', 'acme', 'Acme');
      manager.rememberWorking('stage_completed', { stage: 'discovery' }, 4);
      manager.rememberWorking('stage_failed', { stage: 'enrichment' }, 8);
      manager.rememberWorking('run_paused', {}, 9);

      const promoted = await manager.endRun();

      expect(promoted).toEqual([
        {
          key: NOTABLE_EVENTS_KEY,
          kind: 'collection',
          value: ['stage_failed {"stage":"enrichment"}', 'run_paused'],
          importance: 9,
          recordedAt: '2026-01-02T10:00:00.000Z',
          executionId: 'exec-1',
          stage: undefined,
        },
      ]);
      expect(manager.workingEntries()).toEqual([]);
      expect((await entities.get('acme'))?.displayName).toBe('Acme');
    });

    it('writes nothing when no entry qualifies', async () => {
      manager.beginRun('exec-1', 'acme');
      manager.rememberWorking('stage_completed', {}, 3);

      expect(await manager.endRun()).toEqual([]);
      expect(entities.writes).toBe(0);
    });

    it('does nothing on endRun without a run', async () => {
      expect(await manager.endRun()).toEqual([]);
    });

    it('discards leftovers when a new run begins', () => {
      manager.beginRun('exec-1', 'acme');
      manager.rememberWorking('stale', {}, 9);
      manager.beginRun('exec-2', 'globex');

      expect(manager.workingEntries()).toEqual([]);
      expect(manager.currentRun?.executionId).toBe('exec-2');
    });
  });

  describe('recall', () => {
    beforeEach(async () => {
      await manager.rememberLongTerm('acme', [
        { key: 'industry', value: 'Logistics', importance: 6 },
        { key: 'size', value: 'large', importance: 9 },
      ]);
      now = new Date('2026-01-03T10:00:00.000Z');
      await manager.rememberLongTerm('acme', { key: 'website', value: 'acme.example', importance: 2 });
    });

    it('orders by recency, then importance', async () => {
      const recalled = await manager.recall('acme');

      expect(recalled.map((fact) => fact.line)).toEqual([
        'website: acme.example',
        'size: large',
        'industry: Logistics',
      ]);
    });

    it('respects the item budget', async () => {
      const recalled = await manager.recall('acme', { maxItems: 2 });

      expect(recalled.map((fact) => fact.key)).toEqual(['website', 'size']);
    });

    it('returns the longest prefix within the character budget', async () => {
      // 'website: acme.example' is 21 chars, 'size: large' is 11
      const recalled = await manager.recall('acme', { maxChars: 35 });

      expect(recalled.map((fact) => fact.key)).toEqual(['website', 'size']);
      const used = recalled.reduce((total, fact) => total + fact.line.length, 0);
      expect(used).toBeLessThanOrEqual(35);
    });

    it('stops at the first fact that does not fit', async () => {
      expect(await manager.recall('acme', { maxChars: 20 })).toEqual([]);
    });

    it('recalls nothing for an unknown entity', async () => {
      expect(await manager.recall('globex')).toEqual([]);
    });
  });

  describe('patterns', () => {
    it('buckets outcomes by the recorded size', async () => {
      await manager.recordOutcome('acme', 'discovery', { success: true, durationMs: 200 });
      await manager.rememberLongTerm('acme', { key: 'size', value: 'large' });
      await manager.recordOutcome('acme', 'roles', { success: false, durationMs: 300, error: 'timeout' });

      expect((await patterns.get('discovery__unknown'))?.successes).toBe(1);
      expect((await patterns.get('roles__large'))?.failures).toBe(1);
    });

    it('renders hints for the entity bucket', async () => {
      await manager.rememberLongTerm('acme', { key: 'size', value: 'large' });
      await manager.recordOutcome('acme', 'roles', { success: true, durationMs: 2000 });

      const hints = await manager.patternHints('acme', 'roles');

      expect(hints.map((hint) => hint.text)).toEqual([
        'roles (large): 1/1 runs succeeded (100%), avg 2.0s',
      ]);
      expect(await manager.patternHints('acme', 'structure')).toEqual([]);
    });
  });

  describe('forget / describeEntity', () => {
    it('clears long-term memory but keeps pattern statistics', async () => {
      await manager.rememberLongTerm('acme', { key: 'size', value: 'large' });
      await manager.recordOutcome('acme', 'roles', { success: true, durationMs: 10 });

      expect(await manager.forget('acme')).toBe(true);
      expect(await manager.describeEntity('acme')).toBeUndefined();
      expect(await patterns.get('roles__large')).toBeDefined();
    });

    it('describes the current view', async () => {
      await manager.rememberLongTerm('acme', { key: 'size', value: 'medium' }, { displayName: 'Acme' });
      await manager.rememberLongTerm('acme', { key: 'size', value: 'large' });

      const description = await manager.describeEntity('acme');

      expect(description?.displayName).toBe('Acme');
      expect(description?.recordCount).toBe(2);
      expect(description?.facts.map((fact) => fact.value)).toEqual(['large']);
    });

    it('reports stats', async () => {
      await manager.rememberLongTerm('acme', { key: 'size', value: 'large' });

      expect(await manager.stats()).toEqual({ entities: 1, patterns: 0, workingEntries: 0 });
    });
  });
});
