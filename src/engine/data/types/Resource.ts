// ─────────────────────────────────────────────
//  Resource Types
// ─────────────────────────────────────────────

export const RESOURCE_IDS = [
  'wood', 'wine', 'rock', 'food', 'water', 'sand', 'clay',
  'iron', 'copper', 'tin', 'nickel', 'lead', 'salt', 'sulfur',
  'coal', 'steel', 'bronze', 'sulfuric_acid', 'chlorine',
  'builder_materials', 'instrument', 'ancient_tool', 'herbs',
] as const;

export type ResourceId = typeof RESOURCE_IDS[number];

/** Medium of exchange; exempt from the storage cap. */
export const CURRENCY: ResourceId = 'wine';

/** Stock per resource. A missing entry reads as 0. */
export type ResourceStock = Partial<Record<ResourceId, number>>;

/** Amounts required (or produced) per resource. */
export type ResourceAmounts = Partial<Record<ResourceId, number>>;

/**
 * A price tag. `research` is a threshold on the research counter,
 * which is not a stock entry.
 */
export interface Cost {
  resources: ResourceAmounts;
  research?: number;
}

export type ShortfallSubject = ResourceId | 'research' | 'workers';

export interface Shortfall {
  subject: ShortfallSubject;
  required: number;
  available: number;
}

/** Typed iteration over a partial amount map. */
export function entriesOf(amounts: ResourceAmounts): Array<[ResourceId, number]> {
  const out: Array<[ResourceId, number]> = [];
  for (const id of RESOURCE_IDS) {
    const amt = amounts[id];
    if (amt !== undefined) out.push([id, amt]);
  }
  return out;
}
