// worldcore/shared/Entity.ts

export type EntityId = number;
export type WorldTick = number;

/**
 * One entity as produced by the simulation for a single tick.
 * The core treats these as read-only input: it diffs and serializes them
 * but never writes to them.
 */
export interface EntitySnapshot {
  readonly id: EntityId;

  // Categorical: "ship", "projectile", "pickup", ... (opaque to the core)
  readonly type: string;

  // Position + velocity in world units
  readonly x: number;
  readonly y: number;
  readonly vx: number;
  readonly vy: number;

  // Radians
  readonly direction: number;

  readonly health: number;

  // Player id of the controlling player, null for world-owned entities
  readonly owner: string | null;
}

export const NUMERIC_FIELDS = ["x", "y", "vx", "vy", "direction", "health"] as const;
export const CATEGORICAL_FIELDS = ["type", "owner"] as const;

export type NumericField = (typeof NUMERIC_FIELDS)[number];
export type CategoricalField = (typeof CATEGORICAL_FIELDS)[number];
export type EntityField = NumericField | CategoricalField;

/** Changed fields only; `id` is always present. */
export type EntityPatch = { readonly id: EntityId } & Partial<Omit<EntitySnapshot, "id">>;

/** Axis-aligned area a session is subscribed to. */
export interface Region {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function regionContains(region: Region | null, e: EntitySnapshot): boolean {
  if (!region) return true;
  return e.x >= region.minX && e.x <= region.maxX && e.y >= region.minY && e.y <= region.maxY;
}
