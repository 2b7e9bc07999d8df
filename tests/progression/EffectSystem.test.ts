import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import { EffectSystem } from '@/engine/systems/progression/EffectSystem';
import { catalog, makeState } from '../integration/helpers';

describe('EffectSystem', () => {
  it('floors do not stack', () => {
    const next = produce(makeState(), d => {
      EffectSystem.apply(d, catalog, { kind: 'food_production_floor', value: 1.5 });
      EffectSystem.apply(d, catalog, { kind: 'food_production_floor', value: 2 });
      EffectSystem.apply(d, catalog, { kind: 'food_production_floor', value: 1.5 });
    });
    expect(next.modifiers.foodProduction).toBe(2);
  });

  it('scales compound', () => {
    const next = produce(makeState(), d => {
      EffectSystem.apply(d, catalog, { kind: 'craft_speed_scale', factor: 1.5 });
      EffectSystem.apply(d, catalog, { kind: 'craft_speed_scale', factor: 1.5 });
      EffectSystem.apply(d, catalog, { kind: 'industry_penalty_scale', factor: 1.2 });
    });
    expect(next.modifiers.craftSpeed).toBe(2.25);
    expect(next.modifiers.ecoIndustryPenalty).toBeCloseTo(1.2);
  });

  it('happiness bonus caps at 100', () => {
    const next = produce(makeState(s => { s.happiness = 99; }), d => {
      EffectSystem.apply(d, catalog, { kind: 'happiness_bonus', amount: 2 });
    });
    expect(next.happiness).toBe(100);
  });

  it('resource grants respect the storage cap', () => {
    const next = produce(makeState(), d => {
      EffectSystem.apply(d, catalog, { kind: 'resource_grant', resource: 'wood', amount: 500 });
    });
    expect(next.resources.wood).toBe(125);
  });

  it('describes effects for the log', () => {
    expect(EffectSystem.describe({ kind: 'resource_grant', resource: 'herbs', amount: 10 })).toBe('+10 herbs');
    expect(EffectSystem.describe({ kind: 'craft_speed_scale', factor: 1.1 })).toBe('craft speed scaled by 1.1');
  });
});
