export const TEAPOT_MATERIALS = [
  'ceramic',
  'cast-iron',
  'glass',
  'porcelain',
  'clay',
  'stainless-steel'
] as const;

export const TEAPOT_STYLES = ['kyusu', 'gaiwan', 'english', 'moroccan', 'turkish', 'yixing'] as const;

export const TEA_TYPES = ['green', 'black', 'oolong', 'white', 'puerh', 'herbal', 'rooibos'] as const;

export const CAFFEINE_LEVELS = ['none', 'low', 'medium', 'high'] as const;

export const BREW_STATUSES = ['preparing', 'steeping', 'ready', 'served', 'cold'] as const;

// Pagination bounds shared by every list endpoint
export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

// Used when a brew names a tea the store doesn't know
export const DEFAULT_WATER_TEMP_CELSIUS = 85;
