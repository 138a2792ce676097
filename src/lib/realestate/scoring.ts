import {
  AIRPORT_DISTANCE_LIMIT_KM,
  AREA_SATURATION_FACTOR,
  CONNECTIVITY_DEFAULT,
  LOCATION_VALUES,
  OTHER_MODE_VALUE,
  PREFERRED_SERVICES_DEFAULT,
  PREFERRED_SERVICES_SHARE,
  PRICE_DEFAULT,
  PRICE_RATIO_CAP,
  RAIL_UNKNOWN_VALUE,
  REQUIRED_SERVICES_SHARE,
  ROAD_DISTANCE_LIMIT_KM,
  ROAD_PRESENT_VALUE,
  SCORE_WEIGHTS,
  SQUARE_METERS_PER_HECTARE,
  TRANSPORT_KEYS,
} from '@/config/constants';
import { effectiveMinAreaM2 } from './criteria';
import type {
  Listing,
  ListingScore,
  LocationPreference,
  ScoreBreakdown,
  SearchCriteria,
  TransportData,
} from './types';

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

// 1 at zero distance, 0 at or beyond the limit; negative distances count as 0
function distanceScore(distance: number, limitKm: number): number {
  return Math.max(0, 1 - Math.min(Math.max(distance, 0) / limitKm, 1));
}

// Inherited keys (`constructor`, `toString`) are not transport data
function ownValue(transport: Readonly<TransportData>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(transport, key) ? transport[key] : undefined;
}

function priceRatioScore(value: number, ceiling: number): number {
  return Math.max(0, 1 - Math.min(value / ceiling, PRICE_RATIO_CAP));
}

/**
 * Availability in [0, 1] of one transport mode.
 *
 * - `carretera`: numeric `distancia_km` (0 km full credit, 10 km or more none);
 *   otherwise 0.7 if a `carretera` key is reported at all.
 * - `ferrocarril`: boolean flag, or 0.5 for any other truthy value.
 * - `aeropuerto`: numeric `aeropuerto_km`, zero credit at 50 km.
 * - any other mode: 0.5 when `transport[mode]` is truthy.
 */
export function modeAvailability(mode: string, transport: Readonly<TransportData>): number {
  const normalized = mode.toLowerCase();

  if (normalized === TRANSPORT_KEYS.road) {
    const distance = ownValue(transport, TRANSPORT_KEYS.roadDistance);
    if (isNumber(distance)) return distanceScore(distance, ROAD_DISTANCE_LIMIT_KM);
    return Object.prototype.hasOwnProperty.call(transport, TRANSPORT_KEYS.road) ? ROAD_PRESENT_VALUE : 0;
  }

  if (normalized === TRANSPORT_KEYS.rail) {
    const value = ownValue(transport, TRANSPORT_KEYS.rail);
    if (typeof value === 'boolean') return value ? 1 : 0;
    return value ? RAIL_UNKNOWN_VALUE : 0;
  }

  if (normalized === TRANSPORT_KEYS.airport) {
    const distance = ownValue(transport, TRANSPORT_KEYS.airportDistance);
    return isNumber(distance) ? distanceScore(distance, AIRPORT_DISTANCE_LIMIT_KM) : 0;
  }

  return ownValue(transport, normalized) ? OTHER_MODE_VALUE : 0;
}

/**
 * Weighted average of mode availabilities. Weights need not sum to 1.
 */
export function transportAvailabilityScore(
  transport: Readonly<TransportData>,
  importance: Readonly<Record<string, number>>
): number {
  const modes = Object.keys(importance);
  if (!modes.length) return CONNECTIVITY_DEFAULT;

  const total = modes.reduce((sum, mode) => sum + (importance[mode] || 0), 0) || 1;
  return modes.reduce(
    (acc, mode) => acc + ((importance[mode] || 0) / total) * modeAvailability(mode, transport),
    0
  );
}

function locationScore(listing: Listing, criteria: SearchCriteria): [number, LocationPreference] {
  if (criteria.preferred_communes.length) {
    return criteria.preferred_communes.includes(listing.commune)
      ? [LOCATION_VALUES.preferred, 'Comuna preferida']
      : [LOCATION_VALUES.alternativeCommune, 'Comuna alternativa'];
  }
  if (criteria.preferred_regions.length) {
    return criteria.preferred_regions.includes(listing.region)
      ? [LOCATION_VALUES.preferred, 'Región preferida']
      : [LOCATION_VALUES.alternativeRegion, 'Región alternativa'];
  }
  if (criteria.preferred_macrozones.length) {
    return criteria.preferred_macrozones.includes(listing.macrozone)
      ? [LOCATION_VALUES.preferredMacrozone, 'Macrozona preferida']
      : [LOCATION_VALUES.alternativeMacrozone, 'Macrozona alternativa'];
  }
  return [LOCATION_VALUES.noPreference, 'Sin preferencia'];
}

function priceScore(listing: Listing, criteria: SearchCriteria): number {
  let value = criteria.max_total_price
    ? priceRatioScore(listing.total_price, criteria.max_total_price)
    : PRICE_DEFAULT;
  if (criteria.max_price_per_m2) {
    value = (value + priceRatioScore(listing.price_per_m2, criteria.max_price_per_m2)) / 2;
  }
  return value;
}

/**
 * Score a listing that already passed the filter.
 *
 * Five factors are weighted and summed: location 0.25, services 0.4,
 * price 0.2, connectivity 0.15 and area 0.2, so the score lies in [0, 1.2].
 */
export function scoreListing(listing: Listing, criteria: SearchCriteria): ListingScore {
  const [locationValue, ubicacion] = locationScore(listing, criteria);

  const services = new Set(listing.services.map((service) => service.toLowerCase()));
  const required = new Set(criteria.required_services.map((service) => service.toLowerCase()));
  const preferred = new Set(criteria.preferred_services.map((service) => service.toLowerCase()));
  const covered = [...required].filter((service) => services.has(service));
  const preferredCovered = [...preferred].filter((service) => services.has(service));
  const coverage = required.size ? covered.length / required.size : 1;
  const preferredScore = preferred.size
    ? preferredCovered.length / preferred.size
    : PREFERRED_SERVICES_DEFAULT;

  const areaRatio = listing.area_m2 / Math.max(effectiveMinAreaM2(criteria) || 1, 1);
  const areaValue = Math.min(areaRatio / AREA_SATURATION_FACTOR, 1);

  const breakdown: ScoreBreakdown = {
    ubicacion: locationValue * SCORE_WEIGHTS.ubicacion,
    servicios:
      SCORE_WEIGHTS.servicios *
      (REQUIRED_SERVICES_SHARE * coverage + PREFERRED_SERVICES_SHARE * preferredScore),
    precio: priceScore(listing, criteria) * SCORE_WEIGHTS.precio,
    conectividad:
      transportAvailabilityScore(listing.transport, criteria.transport_importance) *
      SCORE_WEIGHTS.conectividad,
    superficie: areaValue * SCORE_WEIGHTS.superficie,
  };

  const score =
    breakdown.ubicacion +
    breakdown.servicios +
    breakdown.precio +
    breakdown.conectividad +
    breakdown.superficie;

  return {
    score,
    breakdown,
    highlights: {
      area_m2: listing.area_m2,
      area_ha: listing.area_m2 / SQUARE_METERS_PER_HECTARE,
      precio_total_clp: listing.total_price,
      precio_m2_clp: listing.price_per_m2,
      commune: listing.commune,
      region: listing.region,
      macrozona: listing.macrozone,
      transporte: listing.transport,
      servicios_cubiertos: covered,
      servicios_preferidos: preferredCovered,
      ubicacion,
    },
  };
}
