// ─────────────────────────────────────────────
//  Public entry point
// ─────────────────────────────────────────────

export { SettlementEngine, AUTOSAVE_SLOT } from './engine/coordinator/SettlementEngine';
export type {
  EngineOptions, SettlementOverview, MarketQuote, RelationshipView,
} from './engine/coordinator/SettlementEngine';

export type { SettlementState, MarketState } from './engine/state/SettlementState';
export { SettlementStore } from './engine/state/SettlementStore';
export type { DayPhase } from './engine/state/SettlementStore';
export { describeError } from './engine/state/SettlementAction';
export type {
  ActionResult, EngineContext, Requirement, SettlementAction, SettlementError,
} from './engine/state/SettlementAction';

export { MineAction } from './engine/state/actions/MineAction';
export { BuildAction } from './engine/state/actions/BuildAction';
export { AssignWorkersAction } from './engine/state/actions/AssignWorkersAction';
export { CraftAction } from './engine/state/actions/CraftAction';
export { TradeAction } from './engine/state/actions/TradeAction';
export type { TradeSide } from './engine/state/actions/TradeAction';
export { StudyResourceAction } from './engine/state/actions/StudyResourceAction';
export { ResearchTechnologyAction } from './engine/state/actions/ResearchTechnologyAction';
export { DiscoverSecretAction } from './engine/state/actions/DiscoverSecretAction';
export { ToggleMultiplierAction } from './engine/state/actions/ToggleMultiplierAction';
export { TalkAction } from './engine/state/actions/TalkAction';
export { CharacterTradeAction } from './engine/state/actions/CharacterTradeAction';
export { CompleteQuestAction } from './engine/state/actions/CompleteQuestAction';

export { loadCatalog, defaultCatalog, CatalogError } from './engine/loader/CatalogLoader';
export { loadConfig } from './engine/loader/ConfigLoader';
export type { ConfigResult } from './engine/loader/ConfigLoader';
export { DEFAULT_CONFIG } from './engine/data/types/Config';
export type { EngineConfig, Difficulty } from './engine/data/types/Config';
export type { Catalog } from './engine/data/types/Catalog';

export { SaveManager, createSnapshot, restoreState } from './engine/systems/save/SaveManager';
export type { SaveSlot } from './engine/systems/save/SaveManager';
export { FileSaveBackend, MemorySaveBackend } from './engine/systems/save/SaveBackend';
export type { SaveBackend } from './engine/systems/save/SaveBackend';

export { SeededRandom } from './engine/utils/SeededRandom';
export type { RandomSource } from './engine/utils/SeededRandom';
export { Logger } from './engine/utils/Logger';
export type { SettlementEventMap, SettlementEventBus } from './engine/utils/EventBus';

export * from './engine/data/types/Resource';
export * from './engine/data/types/Building';
export * from './engine/data/types/Ecosystem';
export * from './engine/data/types/Production';
export * from './engine/data/types/Progression';
export * from './engine/data/types/Character';
export * from './engine/data/types/Legacy';
export type { Effect, EffectKind, Modifiers } from './engine/data/types/Effect';
export type { CalendarState, EventWindow, RandomEventId } from './engine/data/types/Calendar';
