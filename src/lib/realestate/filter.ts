import { effectiveMinAreaM2 } from './criteria';
import type { Listing, SearchCriteria } from './types';

function lowerSet(values: readonly string[]): Set<string> {
  return new Set(values.map((value) => value.toLowerCase()));
}

function inList(candidates: readonly string[], value: string): boolean {
  return !candidates.length || lowerSet(candidates).has(value.toLowerCase());
}

/**
 * Hard constraints. Every non-empty criterion must hold; string comparisons
 * ignore case.
 */
export function matchesCriteria(listing: Listing, criteria: SearchCriteria): boolean {
  if (!inList(criteria.preferred_regions, listing.region)) return false;
  if (!inList(criteria.preferred_communes, listing.commune)) return false;
  if (!inList(criteria.desired_property_types, listing.property_type)) return false;
  if (!inList(criteria.preferred_macrozones, listing.macrozone)) return false;
  if (!inList(criteria.target_zonings, listing.zoning)) return false;

  const minArea = effectiveMinAreaM2(criteria);
  if (minArea && listing.area_m2 < minArea) return false;

  if (criteria.max_total_price && listing.total_price > criteria.max_total_price) return false;
  if (criteria.max_price_per_m2 && listing.price_per_m2 > criteria.max_price_per_m2) return false;

  const services = lowerSet(listing.services);
  return criteria.required_services.every((service) => services.has(service.toLowerCase()));
}
