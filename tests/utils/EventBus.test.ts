import { describe, it, expect, vi } from 'vitest';
import { createEventBus } from '@/engine/utils/EventBus';

describe('TypedEventBus', () => {
  it('delivers payloads to listeners of that event only', () => {
    const bus = createEventBus();
    const onDay = vi.fn();
    const onVictory = vi.fn();
    bus.on('dayEnded', onDay);
    bus.on('victory', onVictory);
    bus.emit('dayEnded', { day: 2, population: 8, happiness: 50 });
    expect(onDay).toHaveBeenCalledWith({ day: 2, population: 8, happiness: 50 });
    expect(onVictory).not.toHaveBeenCalled();
  });

  it('lets a listener remove itself while being called', () => {
    const bus = createEventBus();
    const calls: string[] = [];
    const once = (): void => {
      calls.push('once');
      bus.off('autosaveDue', once);
    };
    bus.on('autosaveDue', once);
    bus.on('autosaveDue', () => calls.push('always'));
    bus.emit('autosaveDue', { day: 5 });
    bus.emit('autosaveDue', { day: 10 });
    expect(calls).toEqual(['once', 'always', 'always']);
  });

  it('clear drops every listener', () => {
    const bus = createEventBus();
    const listener = vi.fn();
    bus.on('phaseChanged', listener);
    bus.clear();
    bus.emit('phaseChanged', { phase: 'dawn', day: 1 });
    expect(listener).not.toHaveBeenCalled();
  });
});
