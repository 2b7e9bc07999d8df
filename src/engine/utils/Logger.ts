export type LogClass = 'normal' | 'economy' | 'research' | 'ecology' | 'social' | 'event' | 'system';

let muted = false;

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    if (muted) return;
    console.log(`[${type.toUpperCase()}] ${text}`);
  },

  /** Recoverable failures (save I/O, rejected config values) */
  warn(text: string, err?: unknown): void {
    if (muted) return;
    if (err === undefined) console.warn(`[WARN] ${text}`);
    else console.warn(`[WARN] ${text}`, err);
  },

  mute(): void { muted = true; },
};
