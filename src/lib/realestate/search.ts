import { matchesCriteria } from './filter';
import { scoreListing } from './scoring';
import type { Listing, SearchCriteria, SearchResult } from './types';

/**
 * Filter, score and rank listings, best first. Equal scores keep their
 * inventory order. At most `criteria.top` results are returned.
 */
export function searchListings(listings: readonly Listing[], criteria: SearchCriteria): SearchResult[] {
  return listings
    .filter((listing) => matchesCriteria(listing, criteria))
    .map((listing) => ({ listing, ...scoreListing(listing, criteria) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, criteria.top);
}
