import type { Brew, Steep, Tea, Teapot } from './types';

/**
 * Maps an internal field name to the camelCase name used on the wire.
 * Fields whose names are the same in both places are left out.
 */
export type AliasTable = Readonly<Record<string, string>>;

export type WireObject = Record<string, unknown>;

const timestampAliases = {
  created_at: 'createdAt',
  updated_at: 'updatedAt'
} as const;

export const TEAPOT_ALIASES = {
  capacity_ml: 'capacityMl',
  ...timestampAliases
} as const satisfies AliasTable;

export const TEA_ALIASES = {
  caffeine_level: 'caffeineLevel',
  steep_temp_celsius: 'steepTempCelsius',
  steep_time_seconds: 'steepTimeSeconds',
  ...timestampAliases
} as const satisfies AliasTable;

export const BREW_ALIASES = {
  teapot_id: 'teapotId',
  tea_id: 'teaId',
  water_temp_celsius: 'waterTempCelsius',
  started_at: 'startedAt',
  completed_at: 'completedAt',
  ...timestampAliases
} as const satisfies AliasTable;

export const STEEP_ALIASES = {
  brew_id: 'brewId',
  steep_number: 'steepNumber',
  duration_seconds: 'durationSeconds',
  created_at: 'createdAt'
} as const satisfies AliasTable;

// Page/limit carry no aliases of their own
export const NO_ALIASES: AliasTable = {};

export const wireName = (aliases: AliasTable, field: string): string =>
  Object.prototype.hasOwnProperty.call(aliases, field) ? aliases[field] : field;

/**
 * Renames wire keys to internal field names. A key may arrive under either
 * name; when both are sent, the wire name wins. Keys are otherwise passed
 * through untouched so that the schema decides what is known.
 */
export const fromWire = (raw: Record<string, unknown>, aliases: AliasTable): WireObject => {
  const internalByWire = new Map(Object.entries(aliases).map(([internal, wire]) => [wire, internal]));
  const fromAlias = new Set<string>();
  const normalized = new Map<string, unknown>();

  for (const [key, value] of Object.entries(raw)) {
    const internal = internalByWire.get(key);
    if (internal !== undefined) {
      normalized.set(internal, value);
      fromAlias.add(internal);
    } else if (!fromAlias.has(key)) {
      normalized.set(key, value);
    }
  }

  return Object.fromEntries(normalized);
};

export const toWire = (record: object, aliases: AliasTable): WireObject =>
  Object.fromEntries(
    Object.entries(record).map(([field, value]) => [
      wireName(aliases, field),
      value instanceof Date ? value.toISOString() : value
    ])
  );

export const serializeTeapot = (teapot: Teapot): WireObject => toWire(teapot, TEAPOT_ALIASES);

export const serializeTea = (tea: Tea): WireObject => toWire(tea, TEA_ALIASES);

export const serializeBrew = (brew: Brew): WireObject => toWire(brew, BREW_ALIASES);

export const serializeSteep = (steep: Steep): WireObject => toWire(steep, STEEP_ALIASES);

// Brew with its teapot and tea embedded; a dangling reference comes out as null
export const serializeBrewWithDetails = (
  brew: Brew,
  teapot: Teapot | undefined,
  tea: Tea | undefined
): WireObject => ({
  ...serializeBrew(brew),
  teapot: teapot ? serializeTeapot(teapot) : null,
  tea: tea ? serializeTea(tea) : null
});
