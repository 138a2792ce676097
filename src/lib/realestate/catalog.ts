import { searchListings } from './search';
import type { Listing, SearchCriteria, SearchResult } from './types';

export interface GeographyLookups {
  communesByRegion: ReadonlyMap<string, readonly string[]>;
  allCommunes: readonly string[];
  regions: readonly string[];
  propertyTypes: readonly string[];
  macrozones: readonly string[];
}

/**
 * One loaded inventory. A reload builds a new Catalog; an existing one is
 * never modified.
 */
export interface Catalog {
  readonly listings: readonly Listing[];
  readonly source: string;
  readonly loadedAt: Date;
  readonly lookups: GeographyLookups;
}

function sortSpanish(values: Iterable<string>): string[] {
  return Array.from(values).sort((a, b) => a.localeCompare(b, 'es', { sensitivity: 'base' }));
}

function distinct(values: readonly string[]): string[] {
  return sortSpanish(new Set(values.filter(Boolean)));
}

export function buildGeographyLookups(listings: readonly Listing[]): GeographyLookups {
  const communes = new Map<string, Set<string>>();
  const allCommunes = new Set<string>();

  for (const listing of listings) {
    if (listing.region) {
      const regionCommunes = communes.get(listing.region) ?? new Set<string>();
      if (listing.commune) regionCommunes.add(listing.commune);
      communes.set(listing.region, regionCommunes);
    }
    if (listing.commune) allCommunes.add(listing.commune);
  }

  return {
    communesByRegion: new Map(
      sortSpanish(communes.keys()).map((region) => [region, sortSpanish(communes.get(region) ?? [])])
    ),
    allCommunes: sortSpanish(allCommunes),
    regions: distinct(listings.map((listing) => listing.region)),
    propertyTypes: distinct(listings.map((listing) => listing.property_type)),
    macrozones: distinct(listings.map((listing) => listing.macrozone)),
  };
}

/**
 * Communes to offer once a region is selected; every commune when the region
 * is empty or unknown.
 */
export function communesFor(lookups: GeographyLookups, region?: string): readonly string[] {
  if (region && lookups.communesByRegion.has(region)) {
    return lookups.communesByRegion.get(region) ?? [];
  }
  return lookups.allCommunes;
}

export function createCatalog(listings: readonly Listing[], source: string): Catalog {
  return Object.freeze({
    listings: Object.freeze([...listings]),
    source,
    loadedAt: new Date(),
    lookups: buildGeographyLookups(listings),
  });
}

export function searchCatalog(catalog: Catalog, criteria: SearchCriteria): SearchResult[] {
  return searchListings(catalog.listings, criteria);
}
