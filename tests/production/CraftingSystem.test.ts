import { describe, it, expect } from 'vitest';
import { CraftingSystem } from '@/engine/systems/production/CraftingSystem';
import { catalog, expectError, expectOk, makeContext, makeState } from '../integration/helpers';

describe('CraftingSystem', () => {
  const ctx = makeContext();

  it('turns inputs into outputs', () => {
    const result = CraftingSystem.craft(makeState(), ctx, 'coal');
    expect(result).toMatchObject({ ok: true, message: 'Crafted Charcoal ×1.00' });
    const next = expectOk(result);
    expect(next.resources.wood).toBe(9);
    expect(next.resources.coal).toBe(1);
  });

  it('scales inputs and outputs by multiplier and hostility', () => {
    const state = makeState(s => { s.multiplierMode = 1; s.resources.wood = 30; s.day = 50; });
    expect(CraftingSystem.batchFactor(state, catalog)).toBe(20);
    const next = expectOk(CraftingSystem.craft(state, ctx, 'coal'));
    expect(next.resources.wood).toBe(10);
    expect(next.resources.coal).toBe(20);
  });

  it('is all or nothing', () => {
    const state = makeState(s => { s.resources.copper = 7; });
    expect(expectError(CraftingSystem.craft(state, ctx, 'bronze'))).toEqual({
      kind: 'unaffordable',
      shortfall: [{ subject: 'tin', required: 3, available: 0 }],
    });
  });

  it('gates recipes behind their unlock', () => {
    expect(expectError(CraftingSystem.craft(makeState(), ctx, 'ancient_tool'))).toEqual({
      kind: 'prerequisite_unmet',
      requirement: { kind: 'secret', id: 'forge_of_souls' },
    });
    expect(CraftingSystem.available(makeState(), catalog)).not.toContain('ancient_tool');
  });

  it('consumes research along with the inputs', () => {
    const state = makeState(s => {
      s.discoveredSecrets.push('forge_of_souls');
      s.resources.instrument = 2;
      s.resources.steel = 1;
      s.researchProgress = 25;
    });
    expect(CraftingSystem.available(state, catalog)).toContain('ancient_tool');
    const next = expectOk(CraftingSystem.craft(state, ctx, 'ancient_tool'));
    expect(next.researchProgress).toBe(5);
    expect(next.resources).toMatchObject({ instrument: 0, steel: 0, ancient_tool: 1 });
  });

  it('reports missing research', () => {
    const state = makeState(s => {
      s.discoveredSecrets.push('forge_of_souls');
      s.resources.instrument = 2;
      s.resources.steel = 1;
      s.researchProgress = 10;
    });
    expect(expectError(CraftingSystem.craft(state, ctx, 'ancient_tool'))).toEqual({
      kind: 'unaffordable',
      shortfall: [{ subject: 'research', required: 20, available: 10 }],
    });
  });
});
