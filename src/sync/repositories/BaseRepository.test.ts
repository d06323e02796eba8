import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestContext, newLocation, newPhoto, newReport, newTimeRecord, TEST_USER_ID, type TestContext } from '@/test/helpers';

describe('BaseRepository', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
  });

  afterEach(async () => {
    await ctx.database.close();
  });

  it('stores new records unsynced and queues them by entity priority', async () => {
    const record = await ctx.repositories.timeRecords.create(newTimeRecord('2024-05-01T08:00:00.000Z'));

    expect(await ctx.repositories.timeRecords.getById(record.id)).toEqual({
      id: record.id,
      user_id: TEST_USER_ID,
      type: 'ClockIn',
      timestamp: '2024-05-01T08:00:00.000Z',
      latitude: 52.52,
      longitude: 13.405,
      is_synced: 0,
      remote_id: null,
      created_at: record.created_at,
      updated_at: record.updated_at,
    });
    expect(await ctx.syncQueue.getItem('TimeRecord', record.id)).toMatchObject({ priority: 100, retry_count: 0 });
  });

  it('requires a user id', async () => {
    await expect(ctx.repositories.reports.create({ ...newReport('Site visit'), user_id: '' })).rejects.toThrow(
      'user_id is required'
    );
  });

  it('marks a record synced together with its remote id, once', async () => {
    const record = await ctx.repositories.locations.create(newLocation('2024-05-01T08:00:00.000Z'));

    expect(await ctx.repositories.locations.markSynced(record.id, 'srv-1')).toBe(true);
    expect(await ctx.repositories.locations.markSynced(record.id, 'srv-2')).toBe(false);

    const stored = await ctx.repositories.locations.getById(record.id);
    expect(stored?.is_synced).toBe(1);
    expect(stored?.remote_id).toBe('srv-1');
  });

  it('refuses to mark a record synced without a remote id', async () => {
    const record = await ctx.repositories.locations.create(newLocation('2024-05-01T08:00:00.000Z'));

    await expect(ctx.repositories.locations.markSynced(record.id, '')).rejects.toThrow(
      `Cannot mark Location ${record.id} synced without a remote id`
    );
  });

  it('only flips the synced flag for rows that carry a remote id', async () => {
    const repo = ctx.repositories.timeRecords;
    const record = await repo.create(newTimeRecord('2024-05-01T08:00:00.000Z'));

    expect(await repo.updateSyncStatus(record.id, true)).toBe(0);
    expect(await repo.updateRemoteId(record.id, 'srv-1')).toBe(true);
    expect(await repo.updateSyncStatus([record.id], true)).toBe(1);

    // A synced row never reverts
    expect(await repo.updateSyncStatus(record.id, false)).toBe(0);
    expect(await repo.updateRemoteId(record.id, 'srv-2')).toBe(false);
    expect(await repo.getById(record.id)).toMatchObject({ is_synced: 1, remote_id: 'srv-1' });
  });

  it('returns pending rows oldest first, honoring the limit', async () => {
    const repo = ctx.repositories.timeRecords;
    const late = await repo.create(newTimeRecord('2024-05-01T17:00:00.000Z', 'ClockOut'));
    const early = await repo.create(newTimeRecord('2024-05-01T08:00:00.000Z'));
    const synced = await repo.create(newTimeRecord('2024-05-01T07:00:00.000Z'));
    await repo.markSynced(synced.id, 'srv-1');

    expect((await repo.getPendingSync()).map((r) => r.id)).toEqual([early.id, late.id]);
    expect((await repo.getPendingSync(1)).map((r) => r.id)).toEqual([early.id]);
    expect(await repo.countPendingSync()).toBe(2);
  });

  it('removes the queue entry when a record is deleted', async () => {
    const record = await ctx.repositories.timeRecords.create(newTimeRecord('2024-05-01T08:00:00.000Z'));

    const removed = await ctx.repositories.timeRecords.delete(record.id);

    expect(removed?.id).toBe(record.id);
    expect(await ctx.repositories.timeRecords.getById(record.id)).toBeNull();
    expect(await ctx.syncQueue.getItem('TimeRecord', record.id)).toBeNull();
    expect(await ctx.repositories.timeRecords.delete(record.id)).toBeNull();
  });

  it('clamps persisted photo progress', async () => {
    const photo = await ctx.repositories.photos.create(newPhoto('2024-05-01T08:00:00.000Z'));

    await ctx.repositories.photos.updateSyncProgress(photo.id, 150);

    expect((await ctx.repositories.photos.getById(photo.id))?.sync_progress).toBe(100);
  });

  it('finds the latest clock event of a user', async () => {
    await ctx.repositories.timeRecords.create(newTimeRecord('2024-05-01T08:00:00.000Z'));
    const clockOut = await ctx.repositories.timeRecords.create(newTimeRecord('2024-05-01T17:00:00.000Z', 'ClockOut'));

    expect((await ctx.repositories.timeRecords.getLatest(TEST_USER_ID))?.id).toBe(clockOut.id);
    expect(await ctx.repositories.timeRecords.getLatest('someone-else')).toBeNull();
  });
});
