import { z } from 'zod';
import { ValidationError } from './errors';
import { getMacrozone } from './geography';
import type { Listing, TransportData } from './types';

export const REQUIRED_LISTING_FIELDS = [
  'id',
  'name',
  'region',
  'commune',
  'property_type',
  'area_m2',
  'price_per_m2',
] as const;

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// null/undefined -> '', other scalars stringified
export function toStringOrEmpty(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return String(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'symbol') return Number.NaN;
  return Number(value);
}

function toServiceList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map((item) => toStringOrEmpty(item).trim())
    .filter(Boolean);
}

function toTransport(value: unknown): TransportData {
  return isPlainRecord(value) ? { ...value } : {};
}

/**
 * Trim and give bare hosts an explicit https scheme.
 */
export function normalizeListingUrl(value: unknown): string {
  const url = toStringOrEmpty(value).trim();
  if (url && !/^https?:\/\//i.test(url)) {
    return `https://${url.replace(/^\/+/, '')}`;
  }
  return url;
}

const looseString = z.unknown().transform(toStringOrEmpty);

// Field order matters: the first failing field is the one reported.
export const rawListingSchema = z.object({
  id: looseString,
  name: looseString,
  region: looseString,
  province: looseString,
  commune: looseString,
  locality: looseString,
  property_type: looseString,
  area_m2: z.unknown().transform(toNumber).pipe(z.number().finite().gt(0)),
  price_per_m2: z.unknown().transform(toNumber).pipe(z.number().finite().gte(0)),
  zoning: looseString,
  services: z.unknown().transform(toServiceList),
  transport: z.unknown().transform(toTransport),
  topography: looseString,
  notes: looseString,
  url: z.unknown().transform(normalizeListingUrl),
});

export type RawListing = z.input<typeof rawListingSchema>;

const INVALID_FIELD_MESSAGES: Record<string, (position: number) => string> = {
  area_m2: (position) => `El terreno ${position} tiene una superficie inválida (area_m2).`,
  price_per_m2: (position) => `El terreno ${position} tiene un precio por m² inválido (price_per_m2).`,
};

/**
 * Validate and coerce one raw inventory record.
 *
 * Only key absence fails the required-field check; a required key holding
 * `null` goes on to the coercion rules.
 *
 * @param index 0-based position in the inventory, reported 1-based.
 * @throws {ValidationError}
 */
export function normalizeListing(raw: unknown, index: number): Listing {
  const position = index + 1;

  if (!isPlainRecord(raw)) {
    throw new ValidationError(`El elemento ${position} no es un objeto válido.`, { index: position });
  }

  for (const field of REQUIRED_LISTING_FIELDS) {
    if (!(field in raw)) {
      throw new ValidationError(
        `Falta el campo obligatorio "${field}" en el terreno ${position}.`,
        { index: position, field }
      );
    }
  }

  const parsed = rawListingSchema.safeParse(raw);
  if (!parsed.success) {
    const field = String(parsed.error.issues[0]?.path[0] ?? '');
    const describe = INVALID_FIELD_MESSAGES[field];
    const message = describe
      ? describe(position)
      : `El terreno ${position} tiene un campo inválido (${field}).`;
    throw new ValidationError(message, { index: position, field });
  }

  const data = parsed.data;
  return Object.freeze({
    ...data,
    services: Object.freeze(data.services),
    transport: Object.freeze(data.transport),
    macrozone: getMacrozone(data.region),
    total_price: data.area_m2 * data.price_per_m2,
  });
}

/**
 * Normalize a whole inventory. Fails on the first bad record; no partial
 * results are returned.
 *
 * @throws {ValidationError}
 */
export function prepareListings(data: unknown): Listing[] {
  if (!Array.isArray(data)) {
    throw new ValidationError('El archivo JSON debe contener una lista de terrenos.');
  }
  return data.map((item: unknown, index) => normalizeListing(item, index));
}
