/**
 * GcStrategy Unit Tests
 *
 * Runs against a real SnapshotRepository over a mocked zfs command runner, so
 * the assertions are on the exact zfs calls issued.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GcStrategy } from '../../../src/strategies/gc.strategy';
import { SnapshotRepository } from '../../../src/repositories/snapshot.repository';
import { parseRetentionPolicy } from '../../../src/policy/retention-policy';
import { CatalogError, SubsystemError } from '../../../src/errors';
import type { DatasetContext } from '../../../src/strategies/operation-strategy.interface';
import { epochSeconds } from '../../fixtures/snapshots';

const PROPERTY = 'at.rollc.at:snapkeep';

function row(name: string, iso: string, property = 'h2'): string[] {
  return [`tank/home@${name}`, epochSeconds(iso), '4096', property];
}

describe('GcStrategy', () => {
  let strategy: GcStrategy;
  let mockZfs: { read: ReturnType<typeof vi.fn>; run: ReturnType<typeof vi.fn> };

  const context = (policy: string, dryRun = false): DatasetContext => ({
    dataset: 'tank/home',
    policy: parseRetentionPolicy(policy),
    now: new Date('2026-03-10T11:20:00Z'),
    dryRun,
  });

  beforeEach(() => {
    mockZfs = {
      read: vi.fn(),
      run: vi.fn().mockResolvedValue(undefined),
    };
    strategy = new GcStrategy(new SnapshotRepository(mockZfs, PROPERTY, 'snapkeep'));
  });

  it('should have name "GcStrategy"', () => {
    expect(strategy.name).toBe('GcStrategy');
  });

  it('should destroy the snapshots no window keeps', async () => {
    mockZfs.read.mockResolvedValue([
      row('a', '2026-03-10T10:00:00Z'),
      row('b', '2026-03-10T10:30:00Z'),
      row('c', '2026-03-10T11:15:00Z'),
    ]);

    const result = await strategy.execute(context('h2'));

    expect(mockZfs.run).toHaveBeenCalledTimes(1);
    expect(mockZfs.run).toHaveBeenCalledWith('destroy', ['tank/home@a']);
    expect(result.snapshotsDestroyed).toEqual(['tank/home@a']);
    expect(result.failures).toEqual([]);
  });

  it('should classify everything before the first destroy', async () => {
    mockZfs.read.mockResolvedValue([row('a', '2026-03-10T09:00:00Z'), row('b', '2026-03-10T10:00:00Z')]);

    await strategy.execute(context(''));

    expect(mockZfs.read).toHaveBeenCalledTimes(1);
    expect(mockZfs.read.mock.invocationCallOrder[0]).toBeLessThan(mockZfs.run.mock.invocationCallOrder[0]);
  });

  it('should destroy newest first', async () => {
    mockZfs.read.mockResolvedValue([row('a', '2026-03-10T09:00:00Z'), row('b', '2026-03-10T10:00:00Z')]);

    const result = await strategy.execute(context(''));

    expect(mockZfs.run.mock.calls).toEqual([
      ['destroy', ['tank/home@b']],
      ['destroy', ['tank/home@a']],
    ]);
    expect(result.snapshotsDestroyed).toEqual(['tank/home@b', 'tank/home@a']);
  });

  it('should never destroy protected snapshots', async () => {
    mockZfs.read.mockResolvedValue([row('keep', '2026-03-10T09:00:00Z', '-'), row('drop', '2026-03-10T10:00:00Z')]);

    const result = await strategy.execute(context(''));

    expect(mockZfs.run).toHaveBeenCalledTimes(1);
    expect(mockZfs.run).toHaveBeenCalledWith('destroy', ['tank/home@drop']);
    expect(result.snapshotsDestroyed).toEqual(['tank/home@drop']);
  });

  it('should support dry run mode without destroying', async () => {
    mockZfs.read.mockResolvedValue([row('a', '2026-03-10T09:00:00Z'), row('b', '2026-03-10T10:00:00Z')]);

    const result = await strategy.execute(context('h1', true));

    expect(mockZfs.run).not.toHaveBeenCalled();
    expect(result.dryRun).toBe(true);
    expect(result.snapshotsDestroyed).toEqual(['tank/home@a']);
  });

  it('should record a failed destroy and carry on with the rest', async () => {
    mockZfs.read.mockResolvedValue([
      row('a', '2026-03-10T08:00:00Z'),
      row('b', '2026-03-10T09:00:00Z'),
      row('c', '2026-03-10T10:00:00Z'),
    ]);
    mockZfs.run
      .mockRejectedValueOnce(new SubsystemError(['destroy', 'tank/home@c'], 1, 'snapshot is held'))
      .mockResolvedValue(undefined);

    const result = await strategy.execute(context(''));

    expect(mockZfs.run).toHaveBeenCalledTimes(3);
    expect(result.snapshotsDestroyed).toEqual(['tank/home@b', 'tank/home@a']);
    expect(result.failures).toEqual([
      {
        dataset: 'tank/home',
        target: 'tank/home@c',
        kind: 'subsystem',
        message: 'zfs destroy tank/home@c failed: snapshot is held',
      },
    ]);
  });

  it('should refuse a destroy target that is not a single snapshot', async () => {
    mockZfs.read.mockResolvedValue([row('a%z', '2026-03-10T09:00:00Z'), row('b', '2026-03-10T10:00:00Z')]);

    const result = await strategy.execute(context(''));

    expect(mockZfs.run).toHaveBeenCalledTimes(1);
    expect(mockZfs.run).toHaveBeenCalledWith('destroy', ['tank/home@b']);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({ target: 'tank/home@a%z', kind: 'safety_violation' });
  });

  it('should refuse unsafe targets in dry run too', async () => {
    mockZfs.read.mockResolvedValue([row('a,b', '2026-03-10T09:00:00Z')]);

    const result = await strategy.execute(context('', true));

    expect(result.snapshotsDestroyed).toEqual([]);
    expect(result.failures[0]).toMatchObject({ kind: 'safety_violation' });
  });

  it('should fail the dataset on an unreadable catalog without destroying anything', async () => {
    mockZfs.read.mockResolvedValue([
      row('a', '2026-03-10T09:00:00Z'),
      ['tank/home@b', 'yesterday', '4096', 'h2'],
    ]);

    await expect(strategy.execute(context(''))).rejects.toThrow(CatalogError);
    expect(mockZfs.run).not.toHaveBeenCalled();
  });
});
