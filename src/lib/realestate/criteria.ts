import { z } from 'zod';
import { DEFAULT_TOP, SQUARE_METERS_PER_HECTARE } from '@/config/constants';
import { isPlainRecord, toStringOrEmpty } from './listing';
import type { SearchCriteria } from './types';

export type AreaUnit = 'm2' | 'ha';

/** Single-valued fields submitted by the search form (or its query string). */
export const SEARCH_FORM_FIELDS = [
  'region',
  'commune',
  'property_type',
  'macrozona',
  'zoning',
  'min_area',
  'area_unit',
  'required_services',
  'preferred_services',
  'max_price',
  'max_price_m2',
  'top',
] as const;

export type SearchFormField = (typeof SEARCH_FORM_FIELDS)[number];

export type SearchFormValues = Partial<Record<SearchFormField, string>>;

export function splitList(value: string): string[] {
  return value
    .split(/[,;]/)
    .map((item) => item.trim())
    .filter(Boolean);
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map((item) => toStringOrEmpty(item).trim()).filter(Boolean);
  }
  if (typeof value === 'string') return splitList(value);
  if (typeof value === 'number' || typeof value === 'boolean') return [String(value)];
  return [];
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Parse a number typed in es-CL format: `.` groups thousands and `,` is the
 * decimal separator ("1.500.000", "2,5").
 */
export function parseLocaleNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const normalized = trimmed
    .replace(/\u00a0/g, '')
    .replace(/\s/g, '')
    .replace(/\./g, '')
    .replace(',', '.');
  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(normalized)) return null;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

function toArea(value: unknown): number {
  const parsed = toFiniteNumber(value);
  return parsed !== null && parsed > 0 ? parsed : 0;
}

function toCeiling(value: unknown): number | null {
  const parsed = toFiniteNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

function toTop(value: unknown): number {
  const parsed = toFiniteNumber(value);
  const top = parsed === null ? 0 : Math.trunc(parsed);
  return top > 0 ? top : DEFAULT_TOP;
}

function toImportance(value: unknown): Record<string, number> {
  if (!isPlainRecord(value)) return {};
  const importance: Record<string, number> = {};
  for (const [mode, weight] of Object.entries(value)) {
    const parsed = toFiniteNumber(weight);
    if (mode && parsed !== null && parsed >= 0) importance[mode] = parsed;
  }
  return importance;
}

const stringList = z.unknown().transform(toStringList);

export const rawCriteriaSchema = z.object({
  preferred_regions: stringList,
  preferred_communes: stringList,
  preferred_macrozones: stringList,
  desired_property_types: stringList,
  target_zonings: stringList,
  min_area: z.unknown().transform(toArea),
  min_area_m2: z.unknown().transform(toArea),
  min_area_hectares: z.unknown().transform(toArea),
  area_unit: z.unknown().transform((value): AreaUnit => (value === 'ha' ? 'ha' : 'm2')),
  max_total_price: z.unknown().transform(toCeiling),
  max_price_per_m2: z.unknown().transform(toCeiling),
  required_services: stringList,
  preferred_services: stringList,
  transport_importance: z.unknown().transform(toImportance),
  top: z.unknown().transform(toTop),
});

export type RawCriteria = z.input<typeof rawCriteriaSchema>;

interface AreaInput {
  minAreaM2: number;
  minAreaHectares: number;
  // value typed next to a unit selector
  minArea: number;
  unit: AreaUnit;
}

/**
 * Reconcile m² and hectare inputs so exactly one minimum area is active.
 * A nonzero hectare value wins and clears the m² threshold.
 */
function reconcileArea({ minAreaM2, minAreaHectares, minArea, unit }: AreaInput) {
  let m2 = minAreaM2;
  let hectares = minAreaHectares;
  if (minArea) {
    if (unit === 'ha') hectares = minArea;
    else m2 = minArea;
  } else if (unit === 'ha' && m2 && !hectares) {
    hectares = m2;
  }
  if (hectares) m2 = 0;
  return { min_area_m2: m2, min_area_hectares: hectares };
}

/**
 * Build criteria from a loosely typed record, such as a criteria JSON file or
 * an API body. Never throws: unknown shapes fall back to "no constraint".
 */
export function buildCriteria(raw: unknown): SearchCriteria {
  const { min_area, area_unit, ...rest } = rawCriteriaSchema.parse(isPlainRecord(raw) ? raw : {});

  return Object.freeze({
    ...rest,
    ...reconcileArea({
      minAreaM2: rest.min_area_m2,
      minAreaHectares: rest.min_area_hectares,
      minArea: min_area,
      unit: area_unit,
    }),
  });
}

function single(value: string | undefined): string[] {
  const trimmed = (value ?? '').trim();
  return trimmed ? [trimmed] : [];
}

/**
 * Build criteria from the search form's single-valued fields.
 */
export function criteriaFromForm(values: SearchFormValues): SearchCriteria {
  const minArea = parseLocaleNumber(values.min_area);
  const unit: AreaUnit = values.area_unit === 'ha' ? 'ha' : 'm2';
  const maxPrice = parseLocaleNumber(values.max_price);
  const maxPriceM2 = parseLocaleNumber(values.max_price_m2);

  return Object.freeze({
    preferred_regions: single(values.region),
    preferred_communes: single(values.commune),
    preferred_macrozones: single(values.macrozona),
    desired_property_types: single(values.property_type),
    target_zonings: single(values.zoning),
    ...reconcileArea({
      minAreaM2: 0,
      minAreaHectares: 0,
      minArea: minArea !== null && minArea > 0 ? minArea : 0,
      unit,
    }),
    max_total_price: maxPrice !== null && maxPrice > 0 ? maxPrice : null,
    max_price_per_m2: maxPriceM2 !== null && maxPriceM2 > 0 ? maxPriceM2 : null,
    required_services: splitList(values.required_services ?? ''),
    preferred_services: splitList(values.preferred_services ?? ''),
    transport_importance: {},
    top: toTop(values.top),
  });
}

/**
 * The single minimum-area threshold, in m², shared by filtering and scoring.
 */
export function effectiveMinAreaM2(criteria: Pick<SearchCriteria, 'min_area_m2' | 'min_area_hectares'>): number {
  const minM2 = Math.max(criteria.min_area_m2 || 0, 0);
  if (criteria.min_area_hectares) {
    return Math.max(minM2, criteria.min_area_hectares * SQUARE_METERS_PER_HECTARE);
  }
  return minM2;
}
