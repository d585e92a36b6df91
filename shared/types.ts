import { z } from 'zod';
import {
  TEAPOT_MATERIALS,
  TEAPOT_STYLES,
  TEA_TYPES,
  CAFFEINE_LEVELS,
  BREW_STATUSES,
  DEFAULT_PAGE,
  DEFAULT_LIMIT,
  MAX_LIMIT
} from './constants';

// Records are validated and stored under their internal (snake_case) names.
// Wire names are applied at the HTTP boundary, see ./wire.ts

export const TeapotMaterialSchema = z.enum(TEAPOT_MATERIALS);
export type TeapotMaterial = z.infer<typeof TeapotMaterialSchema>;

export const TeapotStyleSchema = z.enum(TEAPOT_STYLES);
export type TeapotStyle = z.infer<typeof TeapotStyleSchema>;

export const TeaTypeSchema = z.enum(TEA_TYPES);
export type TeaType = z.infer<typeof TeaTypeSchema>;

export const CaffeineLevelSchema = z.enum(CAFFEINE_LEVELS);
export type CaffeineLevel = z.infer<typeof CaffeineLevelSchema>;

export const BrewStatusSchema = z.enum(BREW_STATUSES);
export type BrewStatus = z.infer<typeof BrewStatusSchema>;

// Field constraints, shared between a record and its request variants
const teapotName = z.string().min(1).max(100);
const capacityMl = z.number().int().min(1).max(5000);
const teapotDescription = z.string().max(500);

const teaName = z.string().min(1).max(100);
const teaOrigin = z.string().max(100);
const steepTempCelsius = z.number().int().min(60).max(100);
const steepTimeSeconds = z.number().int().min(1).max(600);
const teaDescription = z.string().max(1000);

const waterTempCelsius = z.number().int().min(60).max(100);
const brewNotes = z.string().max(500);

const durationSeconds = z.number().int().min(1);
const steepRating = z.number().int().min(1).max(5);
const steepNotes = z.string().max(200);

const timestamp = z.date();
const isoTimestamp = z
  .string()
  .datetime({ offset: true, message: 'Invalid datetime, expected ISO 8601' })
  .transform((value) => new Date(value));

// ---------------------------------------------------------------------------
// Teapot
// ---------------------------------------------------------------------------

export const TeapotSchema = z.object({
  id: z.string(),
  name: teapotName,
  material: TeapotMaterialSchema,
  capacity_ml: capacityMl,
  style: TeapotStyleSchema,
  description: teapotDescription.nullable(),
  created_at: timestamp,
  updated_at: timestamp
});

export type Teapot = z.infer<typeof TeapotSchema>;

export const CreateTeapotSchema = z.object({
  name: teapotName,
  material: TeapotMaterialSchema,
  capacity_ml: capacityMl,
  style: TeapotStyleSchema.default('english'),
  description: teapotDescription.nullable().default(null)
});

export type CreateTeapot = z.infer<typeof CreateTeapotSchema>;

// PUT replaces the whole teapot, so style loses its default
export const UpdateTeapotSchema = CreateTeapotSchema.extend({
  style: TeapotStyleSchema
});

export type UpdateTeapot = z.infer<typeof UpdateTeapotSchema>;

export const PatchTeapotSchema = z.object({
  name: teapotName.optional(),
  material: TeapotMaterialSchema.optional(),
  capacity_ml: capacityMl.optional(),
  style: TeapotStyleSchema.optional(),
  description: teapotDescription.nullable().optional()
});

export type PatchTeapot = z.infer<typeof PatchTeapotSchema>;

// ---------------------------------------------------------------------------
// Tea
// ---------------------------------------------------------------------------

export const TeaSchema = z.object({
  id: z.string(),
  name: teaName,
  type: TeaTypeSchema,
  origin: teaOrigin.nullable(),
  caffeine_level: CaffeineLevelSchema,
  steep_temp_celsius: steepTempCelsius,
  steep_time_seconds: steepTimeSeconds,
  description: teaDescription.nullable(),
  created_at: timestamp,
  updated_at: timestamp
});

export type Tea = z.infer<typeof TeaSchema>;

export const CreateTeaSchema = z.object({
  name: teaName,
  type: TeaTypeSchema,
  origin: teaOrigin.nullable().default(null),
  caffeine_level: CaffeineLevelSchema.default('medium'),
  steep_temp_celsius: steepTempCelsius,
  steep_time_seconds: steepTimeSeconds,
  description: teaDescription.nullable().default(null)
});

export type CreateTea = z.infer<typeof CreateTeaSchema>;

export const UpdateTeaSchema = CreateTeaSchema.extend({
  caffeine_level: CaffeineLevelSchema
});

export type UpdateTea = z.infer<typeof UpdateTeaSchema>;

export const PatchTeaSchema = z.object({
  name: teaName.optional(),
  type: TeaTypeSchema.optional(),
  origin: teaOrigin.nullable().optional(),
  caffeine_level: CaffeineLevelSchema.optional(),
  steep_temp_celsius: steepTempCelsius.optional(),
  steep_time_seconds: steepTimeSeconds.optional(),
  description: teaDescription.nullable().optional()
});

export type PatchTea = z.infer<typeof PatchTeaSchema>;

// ---------------------------------------------------------------------------
// Brew
// ---------------------------------------------------------------------------

export const BrewSchema = z.object({
  id: z.string(),
  teapot_id: z.string(),
  tea_id: z.string(),
  status: BrewStatusSchema,
  water_temp_celsius: waterTempCelsius,
  notes: brewNotes.nullable(),
  started_at: timestamp,
  completed_at: timestamp.nullable(),
  created_at: timestamp,
  updated_at: timestamp
});

export type Brew = z.infer<typeof BrewSchema>;

export const CreateBrewSchema = z.object({
  teapot_id: z.string().min(1),
  tea_id: z.string().min(1),
  // Left out (or null) means the server picks the temperature
  water_temp_celsius: waterTempCelsius.nullable().optional(),
  notes: brewNotes.nullable().default(null)
});

export type CreateBrew = z.infer<typeof CreateBrewSchema>;

// Only the brew's progress is mutable; teapot and tea are fixed at creation
export const PatchBrewSchema = z.object({
  status: BrewStatusSchema.optional(),
  notes: brewNotes.nullable().optional(),
  completed_at: isoTimestamp.nullable().optional()
});

export type PatchBrew = z.infer<typeof PatchBrewSchema>;

// ---------------------------------------------------------------------------
// Steep
// ---------------------------------------------------------------------------

export const SteepSchema = z.object({
  id: z.string(),
  brew_id: z.string(),
  steep_number: z.number().int().min(1),
  duration_seconds: durationSeconds,
  rating: steepRating.nullable(),
  notes: steepNotes.nullable(),
  created_at: timestamp
});

export type Steep = z.infer<typeof SteepSchema>;

export const CreateSteepSchema = z.object({
  duration_seconds: durationSeconds,
  rating: steepRating.nullable().default(null),
  notes: steepNotes.nullable().default(null)
});

export type CreateSteep = z.infer<typeof CreateSteepSchema>;

// ---------------------------------------------------------------------------
// Query strings
// ---------------------------------------------------------------------------

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(DEFAULT_PAGE),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT)
});

export type PageQuery = z.infer<typeof PageQuerySchema>;

export const TeapotQuerySchema = PageQuerySchema.extend({
  material: TeapotMaterialSchema.optional(),
  style: TeapotStyleSchema.optional()
});

export type TeapotQuery = z.infer<typeof TeapotQuerySchema>;

export const TeaQuerySchema = PageQuerySchema.extend({
  type: TeaTypeSchema.optional(),
  caffeine_level: CaffeineLevelSchema.optional()
});

export type TeaQuery = z.infer<typeof TeaQuerySchema>;

export const BrewQuerySchema = PageQuerySchema.extend({
  status: BrewStatusSchema.optional(),
  teapot_id: z.string().optional(),
  tea_id: z.string().optional()
});

export type BrewQuery = z.infer<typeof BrewQuerySchema>;
