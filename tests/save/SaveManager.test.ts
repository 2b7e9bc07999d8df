import { describe, it, expect } from 'vitest';
import { SaveManager, SNAPSHOT_VERSION, createSnapshot, restoreState } from '@/engine/systems/save/SaveManager';
import { MemorySaveBackend, type SaveBackend } from '@/engine/systems/save/SaveBackend';
import { makeState } from '../integration/helpers';

const midGame = makeState(s => {
  s.day = 12;
  s.resources.wood = 37.5;
  s.resources.wine = 200;
  s.buildings.les = 2;
  s.workers.les = 2;
  s.population = 9;
  s.idleWorkers = 7;
  s.researchedTechnologies.push('basic_agriculture');
  s.market.priceHistory.wood = [1.9, 2.1];
});

class BrokenBackend implements SaveBackend {
  async read(): Promise<string | null> {
    throw new Error('disk on fire');
  }
  async write(): Promise<void> {
    throw new Error('disk on fire');
  }
  async remove(): Promise<void> {
    throw new Error('disk on fire');
  }
}

describe('SaveManager', () => {
  it('round-trips a settlement', async () => {
    const manager = new SaveManager(new MemorySaveBackend());
    await manager.save('slot1', midGame);
    const slot = await manager.load('slot1');
    expect(slot?.version).toBe(SNAPSHOT_VERSION);
    expect(slot?.id).toBe('slot1');
    expect(slot?.day).toBe(12);
    expect(slot?.snapshot).toEqual(midGame);
  });

  it('returns null for a missing slot', async () => {
    const manager = new SaveManager(new MemorySaveBackend());
    expect(await manager.load('nothing')).toBeNull();
    expect(await manager.hasSave('nothing')).toBe(false);
  });

  it('treats unreadable JSON as no save', async () => {
    const backend = new MemorySaveBackend();
    backend.slots.set('autosave', '{"version": 1, "snap');
    expect(await new SaveManager(backend).load('autosave')).toBeNull();
  });

  it('rejects snapshots from another version', async () => {
    const backend = new MemorySaveBackend();
    const manager = new SaveManager(backend);
    await manager.save('autosave', midGame);
    const stored = backend.slots.get('autosave') ?? '';
    backend.slots.set('autosave', stored.replace(`"version":${SNAPSHOT_VERSION}`, '"version":99'));
    expect(await manager.load('autosave')).toBeNull();
  });

  it('rejects snapshots whose workers do not add up', async () => {
    const backend = new MemorySaveBackend();
    const slot = {
      version: SNAPSHOT_VERSION,
      id: 'autosave',
      timestamp: 0,
      day: 12,
      snapshot: { ...createSnapshot(midGame), idleWorkers: 1 },
    };
    backend.slots.set('autosave', JSON.stringify(slot));
    expect(await new SaveManager(backend).load('autosave')).toBeNull();
  });

  it('never throws on I/O failure', async () => {
    const manager = new SaveManager(new BrokenBackend());
    await expect(manager.save('autosave', midGame)).resolves.toBeUndefined();
    await expect(manager.load('autosave')).resolves.toBeNull();
    await expect(manager.deleteSave('autosave')).resolves.toBeUndefined();
  });

  it('deletes a slot', async () => {
    const manager = new SaveManager(new MemorySaveBackend());
    await manager.save('slot1', midGame);
    expect(await manager.hasSave('slot1')).toBe(true);
    await manager.deleteSave('slot1');
    expect(await manager.hasSave('slot1')).toBe(false);
  });

  describe('restoreState', () => {
    it('accepts a snapshot', () => {
      expect(restoreState(createSnapshot(midGame))).toEqual(midGame);
    });

    it('rejects states that break the ledger or market rules', () => {
      const snapshot = createSnapshot(midGame);
      expect(restoreState({ ...snapshot, resources: { ...snapshot.resources, rock: -1 } })).toBeNull();
      expect(restoreState({ ...snapshot, multiplierMode: 3 })).toBeNull();
      expect(restoreState({ ...snapshot, multiplierMode: 2 })).not.toBeNull();
      expect(restoreState({ ...snapshot, market: { trend: 1, priceHistory: { wood: [0.05] } } })).toBeNull();
    });

    it('rejects anything else', () => {
      expect(restoreState({ day: 3 })).toBeNull();
      expect(restoreState('settlement')).toBeNull();
    });
  });
});
