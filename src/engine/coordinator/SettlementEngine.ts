// ─────────────────────────────────────────────
//  SettlementEngine — the public face of the simulation
//  Owns the store, the context (catalog, config, rng), the event bus
//  and the save queue. Hosts (console, UI, tests) talk only to this.
//
//  Day FSM:  dawn ──startDay──▶ player_actions ──endDay──▶ dawn
// ─────────────────────────────────────────────

import type { Catalog } from '@/engine/data/types/Catalog';
import type { EngineConfig } from '@/engine/data/types/Config';
import type { ResourceId, ResourceStock } from '@/engine/data/types/Resource';
import type { BuildingCounts, WorkerAssignment } from '@/engine/data/types/Building';
import type { EcosystemSummary } from '@/engine/data/types/Ecosystem';
import type { EventWindow } from '@/engine/data/types/Calendar';
import type { TechnologyEntry } from '@/engine/data/types/Progression';
import type { LegacyResult, VictoryType } from '@/engine/data/types/Legacy';
import { CHARACTER_IDS, type CharacterId, type RelationshipTier } from '@/engine/data/types/Character';
import type { SettlementState } from '@/engine/state/SettlementState';
import { SettlementStore, type DayPhase } from '@/engine/state/SettlementStore';
import type { ActionResult, EngineContext, SettlementAction } from '@/engine/state/SettlementAction';
import { defaultCatalog } from '@/engine/loader/CatalogLoader';
import { loadConfig } from '@/engine/loader/ConfigLoader';
import { createEventBus, type SettlementEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { SeededRandom, randomSeed, type RandomSource } from '@/engine/utils/SeededRandom';
import { DaySimulator, type DawnReport, type DuskReport } from '@/engine/systems/day/DaySimulator';
import { createSettlement } from '@/engine/systems/world/SettlementFactory';
import { ResourceLedger } from '@/engine/systems/ledger/ResourceLedger';
import { EcosystemSystem } from '@/engine/systems/ecosystem/EcosystemSystem';
import { EventCalendar } from '@/engine/systems/calendar/EventCalendar';
import { MarketSystem, type SaturationLabel } from '@/engine/systems/market/MarketSystem';
import { ProductionSystem } from '@/engine/systems/production/ProductionSystem';
import { TechnologySystem } from '@/engine/systems/progression/TechnologySystem';
import { RelationshipSystem } from '@/engine/systems/relationship/RelationshipSystem';
import { LegacySystem } from '@/engine/systems/legacy/LegacySystem';
import { SaveManager } from '@/engine/systems/save/SaveManager';
import { FileSaveBackend, type SaveBackend } from '@/engine/systems/save/SaveBackend';

export const AUTOSAVE_SLOT = 'autosave';

/** Valid phase transitions. */
const TRANSITIONS: Record<DayPhase, DayPhase[]> = {
  dawn: ['player_actions'],
  player_actions: ['dawn'],
};

export interface EngineOptions {
  catalog?: Catalog;
  /** Applied on top of defaults and environment */
  config?: Partial<EngineConfig>;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  rng?: RandomSource;
  /** Defaults to files under config.savePath */
  backend?: SaveBackend;
}

export interface RelationshipView {
  id: CharacterId;
  name: string;
  score: number;
  tier: RelationshipTier;
}

export interface SettlementOverview {
  day: number;
  phase: DayPhase;
  multiplier: number;
  storageCapacity: number;
  happiness: number;
  population: number;
  idleWorkers: number;
  resources: ResourceStock;
  buildings: BuildingCounts;
  storageUnits: number;
  workers: WorkerAssignment;
  researchProgress: number;
  researchComplete: boolean;
  victory: VictoryType | null;
  ecosystem: EcosystemSummary;
  hostility: number;
  activeWindow: EventWindow | null;
  relationships: RelationshipView[];
}

export interface MarketQuote {
  resource: ResourceId;
  price: number;
  saturation: SaturationLabel;
}

export class SettlementEngine {
  readonly events: SettlementEventBus = createEventBus();
  private readonly store: SettlementStore;
  private saveQueue: Promise<void> = Promise.resolve();
  /** State at the last dusk; the only state that is ever persisted. */
  private lastCompleted: SettlementState;

  private constructor(
    private readonly ctx: EngineContext,
    private readonly saves: SaveManager,
    initial: SettlementState,
  ) {
    this.store = new SettlementStore(initial);
    this.lastCompleted = initial;
  }

  // ════════════════════════════════════════════
  //  Construction
  // ════════════════════════════════════════════

  private static prepare(options: EngineOptions): { ctx: EngineContext; saves: SaveManager } {
    const { config, errors } = loadConfig(options.env ?? process.env, options.config);
    for (const e of errors) Logger.warn(`[Config] ignored ${e}`);
    const seed = config.seed ?? randomSeed();
    const ctx: EngineContext = {
      catalog: options.catalog ?? defaultCatalog(),
      config: { ...config, seed },
      rng: options.rng ?? new SeededRandom(seed),
    };
    const saves = new SaveManager(options.backend ?? new FileSaveBackend(config.savePath), ctx.catalog);
    return { ctx, saves };
  }

  /** New world, ignoring any existing save. */
  static create(options: EngineOptions = {}): SettlementEngine {
    const { ctx, saves } = SettlementEngine.prepare(options);
    Logger.log(`New settlement (${ctx.config.difficulty}, seed ${ctx.config.seed})`, 'system');
    return new SettlementEngine(ctx, saves, createSettlement(ctx));
  }

  /** Continue from the autosave slot; a missing or corrupt save starts fresh. */
  static async resume(options: EngineOptions = {}): Promise<SettlementEngine> {
    const { ctx, saves } = SettlementEngine.prepare(options);
    const slot = await saves.load(AUTOSAVE_SLOT);
    if (!slot) {
      Logger.log('No usable autosave, starting fresh', 'system');
      return new SettlementEngine(ctx, saves, createSettlement(ctx));
    }
    Logger.log(`Resumed on day ${slot.day}`, 'system');
    return new SettlementEngine(ctx, saves, slot.snapshot);
  }

  // ════════════════════════════════════════════
  //  Read-only access
  // ════════════════════════════════════════════

  get state(): SettlementState {
    return this.store.getState();
  }

  get phase(): DayPhase {
    return this.store.getPhase();
  }

  get context(): EngineContext {
    return this.ctx;
  }

  subscribe(listener: (state: SettlementState) => void): () => void {
    return this.store.subscribe(listener);
  }

  overview(): SettlementOverview {
    const state = this.state;
    const { catalog } = this.ctx;
    const relationships: RelationshipView[] = [];
    for (const id of CHARACTER_IDS) {
      const data = catalog.characters[id];
      const character = state.characters[id];
      if (!data || !character) continue;
      relationships.push({
        id,
        name: data.name,
        score: character.relationship,
        tier: RelationshipSystem.tier(character.relationship),
      });
    }
    return {
      day: state.day,
      phase: this.phase,
      multiplier: ProductionSystem.currentMultiplier(state, catalog),
      storageCapacity: ResourceLedger.capacity(state, catalog),
      happiness: state.happiness,
      population: state.population,
      idleWorkers: state.idleWorkers,
      resources: state.resources,
      buildings: state.buildings,
      storageUnits: state.storageUnits,
      workers: state.workers,
      researchProgress: state.researchProgress,
      researchComplete: state.researchComplete,
      victory: state.victory,
      ecosystem: EcosystemSystem.summary(state, catalog),
      hostility: EventCalendar.hostility(state, catalog),
      activeWindow: EventCalendar.activeWindow(state, catalog) ?? null,
      relationships,
    };
  }

  technologyBoard(): TechnologyEntry[] {
    return TechnologySystem.board(this.state, this.ctx.catalog);
  }

  legacy(): LegacyResult {
    return LegacySystem.finalLegacy(this.state, this.ctx.catalog);
  }

  /** Quoting records a price sample, so it goes through the store. */
  quote(resource: ResourceId): MarketQuote {
    const { catalog, rng } = this.ctx;
    const quoted = MarketSystem.quote(this.state, catalog, rng, resource);
    this.store.replace(quoted.state);
    return {
      resource,
      price: quoted.price,
      saturation: MarketSystem.saturationLabel(quoted.state, catalog, resource),
    };
  }

  // ════════════════════════════════════════════
  //  Day cycle
  // ════════════════════════════════════════════

  private transition(next: DayPhase): boolean {
    const current = this.phase;
    if (!TRANSITIONS[current].includes(next)) {
      Logger.warn(`[SettlementEngine] Invalid transition: ${current} → ${next}`);
      return false;
    }
    this.store.setPhase(next);
    this.events.emit('phaseChanged', { phase: next, day: this.state.day });
    return true;
  }

  /** Dawn half of the day. Null when the day has already begun. */
  startDay(): DawnReport | null {
    if (this.phase !== 'dawn') return null;
    const report = DaySimulator.beginDay(this.state, this.ctx);
    this.store.replace(report.state);
    for (const id of report.achievements) this.events.emit('achievementUnlocked', { id });
    if (report.event) this.events.emit('randomEvent', { id: report.event.id, day: report.state.day });
    this.transition('player_actions');
    return report;
  }

  /** Run a player action. Opens the day first if needed. */
  perform(action: SettlementAction): ActionResult {
    if (this.phase === 'dawn') this.startDay();
    const before = this.state;
    const result = this.store.dispatch(action, this.ctx);
    if (result.ok) {
      Logger.log(result.message ?? action.type, 'normal');
      this.publishChanges(before, result.state);
    }
    return result;
  }

  /** Dusk half: consumption, population, autosave and victory. */
  endDay(): DuskReport {
    if (this.phase === 'dawn') this.startDay();
    const before = this.state;
    const report = DaySimulator.endDay(before, this.ctx);
    this.store.replace(report.state);
    this.lastCompleted = report.state;
    this.transition('dawn');

    const after = report.state;
    if (report.populationChange !== 0) {
      this.events.emit('populationChanged', {
        from: before.population,
        to: after.population,
        cause: report.populationChange > 0 ? 'birth' : 'starvation',
      });
    }
    this.events.emit('dayEnded', { day: after.day, population: after.population, happiness: after.happiness });
    if (report.autosaveDue) {
      this.events.emit('autosaveDue', { day: after.day });
      this.enqueueSave(AUTOSAVE_SLOT);
    }
    if (report.victory) this.events.emit('victory', { type: report.victory, day: after.day });
    return report;
  }

  /** A whole day with no player actions */
  tick(): DuskReport {
    this.startDay();
    return this.endDay();
  }

  // ════════════════════════════════════════════
  //  Persistence
  // ════════════════════════════════════════════

  /**
   * Queue a save of the last completed day; saves run one after another.
   * Mid-day changes are not written, so a resume replays the open day from dawn.
   */
  save(slotId: string = AUTOSAVE_SLOT): Promise<void> {
    this.enqueueSave(slotId);
    return this.saveQueue;
  }

  /** SaveManager.save never rejects, so the queue never does either. */
  private enqueueSave(slotId: string): void {
    const snapshot = this.lastCompleted;
    this.saveQueue = this.saveQueue.then(() => this.saves.save(slotId, snapshot));
  }

  /** Resolves once every queued save has finished */
  flush(): Promise<void> {
    return this.saveQueue;
  }

  // ════════════════════════════════════════════
  //  Events
  // ════════════════════════════════════════════

  private publishChanges(before: SettlementState, after: SettlementState): void {
    for (const id of after.researchedTechnologies) {
      if (!before.researchedTechnologies.includes(id)) this.events.emit('technologyResearched', { id });
    }
    for (const id of after.discoveredSecrets) {
      if (!before.discoveredSecrets.includes(id)) this.events.emit('secretDiscovered', { id });
    }
    for (const id of CHARACTER_IDS) {
      const from = before.characters[id]?.relationship;
      const to = after.characters[id]?.relationship;
      if (from !== undefined && to !== undefined && from !== to) {
        this.events.emit('relationshipChanged', { character: id, from, to });
      }
    }
  }
}
