/**
 * Well fact accessors.
 *
 * Facts arrive as `{ value, units, source, confidence }` envelopes or as bare
 * values. They are read once into WellFacts; the facts map itself is never
 * mutated.
 */

import type { z } from 'zod';
import {
  annularGapSchema,
  casingStringSchema,
  kopSchema,
  producingIntervalSchema,
  type AnnularGap,
  type CasingString,
  type FactsMap,
  type ProducingInterval,
} from '@shared/schema';

export interface FormationTop {
  name: string;
  topFt: number;
}

export interface WellFacts {
  api14: string | null;
  surfaceShoeFt: number | null;
  intermediateShoeFt: number | null;
  productionShoeFt: number | null;
  hasUqw: boolean;
  uqwBaseFt: number | null;
  hasDuqw: boolean;
  formationTops: FormationTop[];
  producingIntervals: ProducingInterval[];
  annularGaps: AnnularGap[];
  casingStrings: CasingString[];
  /** Upper-cased barrier codes, e.g. "CIBP". */
  existingBarriers: string[];
  existingCibpFt: number | null;
  packerFt: number | null;
  dvToolFt: number | null;
  kopMdFt: number | null;
  kopTvdFt: number | null;
  casingIdIn: number | null;
  casingOdIn: number | null;
  stingerOdIn: number | null;
  holeSizeIn: number | null;
}

// ============================================
// RAW READERS
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unwrap a fact envelope. Plain objects without a `value` key are returned as-is.
 */
export function factValue(facts: FactsMap, key: string): unknown {
  const raw = facts[key];
  if (isRecord(raw) && 'value' in raw) {
    return raw.value;
  }
  return raw;
}

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function factNumber(facts: FactsMap, key: string): number | null {
  return toNumber(factValue(facts, key));
}

export function factBoolean(facts: FactsMap, key: string): boolean {
  const value = factValue(facts, key);
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', 'yes', 'y', '1'].includes(value.trim().toLowerCase());
  return value === 1;
}

export function factString(facts: FactsMap, key: string): string | null {
  const value = factValue(facts, key);
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

function factList<T>(facts: FactsMap, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const value = factValue(facts, key);
  if (!Array.isArray(value)) return [];
  const out: T[] = [];
  for (const item of value) {
    const parsed = schema.safeParse(isRecord(item) && 'value' in item ? item.value : item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

// ============================================
// DERIVED FACTS
// ============================================

/**
 * `formation_tops_map` as `{ "San Andres": 4200 }` or `{ "San Andres": { top_ft: 4200 } }`.
 */
function readFormationTops(facts: FactsMap): FormationTop[] {
  const map = factValue(facts, 'formation_tops_map');
  if (!isRecord(map)) return [];

  const tops: FormationTop[] = [];
  for (const [name, raw] of Object.entries(map)) {
    const topFt = isRecord(raw) ? toNumber(raw.top_ft ?? raw.value) : toNumber(raw);
    if (topFt !== null) tops.push({ name, topFt });
  }
  return tops.sort((a, b) => a.topFt - b.topFt || a.name.localeCompare(b.name));
}

/**
 * Explicit interval list, plus a single `perf_interval: [top, bottom]` fact.
 */
function readProducingIntervals(facts: FactsMap): ProducingInterval[] {
  const intervals = factList(facts, 'producing_intervals', producingIntervalSchema);
  const perf = factValue(facts, 'perf_interval');
  if (Array.isArray(perf) && perf.length === 2) {
    const a = toNumber(perf[0]);
    const b = toNumber(perf[1]);
    if (a !== null && b !== null) {
      intervals.push({ top_ft: Math.min(a, b), bottom_ft: Math.max(a, b), kind: 'perforation' });
    }
  }
  return intervals.map((iv) =>
    iv.top_ft <= iv.bottom_ft ? iv : { ...iv, top_ft: iv.bottom_ft, bottom_ft: iv.top_ft }
  );
}

function readBarriers(facts: FactsMap): string[] {
  const value = factValue(facts, 'existing_mechanical_barriers');
  const list = Array.isArray(value) ? value : typeof value === 'string' ? value.split(',') : [];
  return list
    .filter((v): v is string => typeof v === 'string')
    .map((v) => v.trim().toUpperCase())
    .filter((v) => v.length > 0);
}

function readKop(facts: FactsMap): { md: number | null; tvd: number | null } {
  const parsed = kopSchema.safeParse(factValue(facts, 'kop') ?? {});
  const md = (parsed.success ? parsed.data.kop_md_ft : null) ?? factNumber(facts, 'kop_md_ft');
  const tvd = (parsed.success ? parsed.data.kop_tvd_ft : null) ?? factNumber(facts, 'kop_tvd_ft');
  return { md: md ?? null, tvd: tvd ?? null };
}

function shoeFromStrings(strings: CasingString[], kind: CasingString['kind']): number | null {
  const depths = strings.filter((s) => s.kind === kind).map((s) => s.bottom_ft);
  return depths.length > 0 ? Math.max(...depths) : null;
}

export function readWellFacts(facts: FactsMap): WellFacts {
  const casingStrings = factList(facts, 'casing_strings', casingStringSchema);
  const kop = readKop(facts);

  return {
    api14: factString(facts, 'api14'),
    surfaceShoeFt: factNumber(facts, 'surface_shoe_ft') ?? shoeFromStrings(casingStrings, 'surface'),
    intermediateShoeFt:
      factNumber(facts, 'intermediate_shoe_ft') ?? shoeFromStrings(casingStrings, 'intermediate'),
    productionShoeFt: factNumber(facts, 'production_shoe_ft') ?? shoeFromStrings(casingStrings, 'production'),
    hasUqw: factBoolean(facts, 'has_uqw'),
    uqwBaseFt: factNumber(facts, 'uqw_base_ft'),
    hasDuqw: factBoolean(facts, 'has_duqw'),
    formationTops: readFormationTops(facts),
    producingIntervals: readProducingIntervals(facts),
    annularGaps: factList(facts, 'annular_gaps', annularGapSchema),
    casingStrings,
    existingBarriers: readBarriers(facts),
    existingCibpFt: factNumber(facts, 'existing_cibp_ft'),
    packerFt: factNumber(facts, 'packer_ft'),
    dvToolFt: factNumber(facts, 'dv_tool_ft'),
    kopMdFt: kop.md,
    kopTvdFt: kop.tvd,
    casingIdIn: factNumber(facts, 'casing_id_in'),
    casingOdIn: factNumber(facts, 'casing_od_in'),
    stingerOdIn: factNumber(facts, 'stinger_od_in'),
    holeSizeIn: factNumber(facts, 'hole_size_in'),
  };
}

/**
 * Case-insensitive lookup in the well's formation tops.
 */
export function findFormationTop(well: WellFacts, formation: string): FormationTop | null {
  const target = formation.trim().toLowerCase();
  return well.formationTops.find((t) => t.name.trim().toLowerCase() === target) ?? null;
}

export function hasExistingCibp(well: WellFacts): boolean {
  return well.existingBarriers.includes('CIBP') && well.existingCibpFt !== null;
}
