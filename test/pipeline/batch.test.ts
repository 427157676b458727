import { describe, it, expect } from 'vitest';
import { BatchReport, runIsolated, runItem } from '../../src/pipeline/batch.js';
import { makeTeam } from '../helpers/builders.js';
import { MemoryStore } from '../helpers/memory-store.js';

describe('BatchReport', () => {
  it('records ok, skipped and failed items and summarizes them', async () => {
    const report = new BatchReport('demo');

    await runItem(report, 'a', async () => {});
    await runItem(report, 'b', async () => 'exists');
    await runItem(report, 'c', async () => {
      throw new Error('boom');
    });

    expect(report.items).toEqual([
      { key: 'a', status: 'ok' },
      { key: 'b', status: 'skipped', reason: 'exists' },
      { key: 'c', status: 'failed', error: 'boom' },
    ]);
    expect(report.summary()).toEqual({ task: 'demo', ok: 1, skipped: 1, failed: 1 });
  });

  it('keeps going after a failed item', async () => {
    const report = new BatchReport('demo');
    for (const key of ['x', 'y', 'z']) {
      await runItem(report, key, async () => {
        if (key === 'y') throw new Error('bad record');
      });
    }
    expect(report.keys('ok')).toEqual(['x', 'z']);
    expect(report.get('y')).toEqual({ key: 'y', status: 'failed', error: 'bad record' });
  });

  it('returns undefined for an unknown key', () => {
    expect(new BatchReport('demo').get('missing')).toBeUndefined();
  });
});

describe('runIsolated', () => {
  it('rolls back only the failed item inside a batch transaction', async () => {
    const store = new MemoryStore();
    const report = new BatchReport('demo');

    await store.transaction(async (tx) => {
      for (const id of ['KC', 'BUF', 'PHI']) {
        await runIsolated(tx, report, id, async (unit) => {
          await unit.upsertTeam(makeTeam(id));
          if (id === 'BUF') throw new Error('bad record');
        });
      }
    });

    expect(report.keys('ok')).toEqual(['KC', 'PHI']);
    expect((await store.listTeams()).map((t) => t.id)).toEqual(['KC', 'PHI']);
  });

  it('keeps the batch after a constraint violation', async () => {
    const store = new MemoryStore();
    await store.upsertTeam(makeTeam('KC'));
    const report = new BatchReport('demo');

    await store.transaction(async (tx) => {
      await runIsolated(tx, report, 'first', async (unit) => {
        await unit.insertUserIfMissing({ id: 'u1', username: 'alice' });
      });
      await runIsolated(tx, report, 'orphan', async (unit) => {
        await unit.upsertWager({ userId: 'u9', gameId: 'g1', channelId: 'c1', choice: 'HOME' });
      });
      await runIsolated(tx, report, 'last', async (unit) => {
        await unit.insertUserIfMissing({ id: 'u2', username: 'bob' });
      });
    });

    expect(report.keys('ok')).toEqual(['first', 'last']);
    expect(report.get('orphan')).toEqual({
      key: 'orphan',
      status: 'failed',
      error: 'wagers_user_id_fkey violated by u9',
    });
    expect(await store.getUser('u1')).toEqual({ id: 'u1', username: 'alice' });
    expect(await store.getUser('u2')).toEqual({ id: 'u2', username: 'bob' });
  });

  it('passes the skip reason through', async () => {
    const store = new MemoryStore();
    const report = new BatchReport('demo');

    await runIsolated(store, report, 'a', async () => 'exists');

    expect(report.get('a')).toEqual({ key: 'a', status: 'skipped', reason: 'exists' });
  });
});
