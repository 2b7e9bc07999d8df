import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import { ResourceLedger } from '@/engine/systems/ledger/ResourceLedger';
import { catalog, makeState } from '../integration/helpers';

describe('ResourceLedger', () => {
  describe('capacity', () => {
    it('is base + perUnit × storage units', () => {
      expect(ResourceLedger.capacity(makeState(), catalog)).toBe(125);
      expect(ResourceLedger.capacity(makeState(s => { s.storageUnits = 3; }), catalog)).toBe(275);
    });
  });

  describe('adjust', () => {
    it('clamps positive deltas to capacity', () => {
      const next = produce(makeState(), d => ResourceLedger.adjust(d, catalog, 'wood', 200));
      expect(next.resources.wood).toBe(125);
    });

    it('never drives a stock below zero', () => {
      const next = produce(makeState(), d => ResourceLedger.adjust(d, catalog, 'rock', -50));
      expect(next.resources.rock).toBe(0);
    });

    it('leaves the currency uncapped', () => {
      const next = produce(makeState(), d => ResourceLedger.adjust(d, catalog, 'wine', 1000));
      expect(next.resources.wine).toBe(1010);
    });

    it('reads a missing stock as zero', () => {
      const state = makeState();
      expect(ResourceLedger.stockOf(state, 'iron')).toBe(0);
      const next = produce(state, d => ResourceLedger.adjust(d, catalog, 'iron', 4));
      expect(next.resources.iron).toBe(4);
    });

    it('keeps every capped stock inside [0, capacity] under mixed deltas', () => {
      const deltas = [90, -300, 45.5, 500, -12.25, 0, 80];
      let state = makeState();
      for (const delta of deltas) {
        state = produce(state, d => ResourceLedger.adjust(d, catalog, 'clay', delta));
        const clay = state.resources.clay ?? 0;
        expect(clay).toBeGreaterThanOrEqual(0);
        expect(clay).toBeLessThanOrEqual(125);
      }
    });
  });

  describe('shortfall / affordable', () => {
    it('lists exactly what is missing', () => {
      const state = makeState();
      expect(ResourceLedger.shortfall(state, { resources: { wood: 15, rock: 5 } })).toEqual([
        { subject: 'wood', required: 15, available: 10 },
      ]);
      expect(ResourceLedger.affordable(state, { resources: { wood: 15, rock: 5 } })).toBe(false);
      expect(ResourceLedger.affordable(state, { resources: { wood: 10, rock: 10 } })).toBe(true);
    });

    it('treats research as a threshold on the counter', () => {
      const state = makeState(s => { s.researchProgress = 12; });
      expect(ResourceLedger.shortfall(state, { resources: {}, research: 20 })).toEqual([
        { subject: 'research', required: 20, available: 12 },
      ]);
    });
  });

  describe('debit / credit / scale', () => {
    it('applies a whole cost map', () => {
      const next = produce(makeState(), d => {
        ResourceLedger.debit(d, catalog, { wood: 4, rock: 2.5 });
        ResourceLedger.credit(d, catalog, { sand: 3 });
      });
      expect(next.resources).toMatchObject({ wood: 6, rock: 7.5, sand: 3 });
    });

    it('scales every entry', () => {
      expect(ResourceLedger.scale({ wood: 15, rock: 5 }, 1.1)).toEqual({ wood: 15 * 1.1, rock: 5 * 1.1 });
    });
  });

  it('wealth sums every stock except the currency', () => {
    expect(ResourceLedger.wealth(makeState())).toBe(32);
  });
});
