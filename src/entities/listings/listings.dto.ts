import type { Listing } from '../../lib/realestate/types';

export interface ReloadListingsRequest {
  source?: string;
}

export interface ListingsResponse {
  source: string;
  loadedAt: string;
  count: number;
  listings: readonly Listing[];
}

export interface CatalogSummaryResponse {
  success: boolean;
  source: string;
  loadedAt: string;
  count: number;
  message: string;
}

export interface LookupsResponse {
  regions: readonly string[];
  communes: readonly string[];
  communesByRegion: Record<string, readonly string[]>;
  propertyTypes: readonly string[];
  macrozones: readonly string[];
}
