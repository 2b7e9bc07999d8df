// ─────────────────────────────────────────────
//  Save Backends — where serialized slots live
//  File backend writes to *.tmp then renames, so a crash mid-write
//  leaves the previous save intact.
// ─────────────────────────────────────────────

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface SaveBackend {
  /** Raw slot contents, or null when the slot does not exist */
  read(slotId: string): Promise<string | null>;
  write(slotId: string, data: string): Promise<void>;
  remove(slotId: string): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileSaveBackend implements SaveBackend {
  constructor(private readonly dir: string) {}

  private pathOf(slotId: string): string {
    return join(this.dir, `${slotId}.json`);
  }

  async read(slotId: string): Promise<string | null> {
    try {
      return await readFile(this.pathOf(slotId), 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(slotId: string, data: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathOf(slotId);
    const tmp = `${target}.tmp`;
    await writeFile(tmp, data, 'utf8');
    await rename(tmp, target);
  }

  async remove(slotId: string): Promise<void> {
    await rm(this.pathOf(slotId), { force: true });
  }
}

export class MemorySaveBackend implements SaveBackend {
  readonly slots = new Map<string, string>();

  async read(slotId: string): Promise<string | null> {
    return this.slots.get(slotId) ?? null;
  }

  async write(slotId: string, data: string): Promise<void> {
    this.slots.set(slotId, data);
  }

  async remove(slotId: string): Promise<void> {
    this.slots.delete(slotId);
  }
}
