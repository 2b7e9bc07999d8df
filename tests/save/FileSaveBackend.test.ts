import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSaveBackend } from '@/engine/systems/save/SaveBackend';

describe('FileSaveBackend', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'homestead-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one file per slot and reads it back', async () => {
    const backend = new FileSaveBackend(join(dir, 'saves'));
    await backend.write('autosave', '{"day":3}');
    expect(await backend.read('autosave')).toBe('{"day":3}');
    expect(await readdir(join(dir, 'saves'))).toEqual(['autosave.json']);
  });

  it('reads a missing slot as null', async () => {
    expect(await new FileSaveBackend(dir).read('autosave')).toBeNull();
  });

  it('removes a slot, missing or not', async () => {
    const backend = new FileSaveBackend(dir);
    await backend.write('slot1', '{}');
    await backend.remove('slot1');
    await backend.remove('slot1');
    expect(await backend.read('slot1')).toBeNull();
  });
});
