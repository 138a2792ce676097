import env from '@/config/env';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { RouteError } from '../../other/errorHandler';
import { catalogStore } from '../../lib/inventory/catalog-store';
import { communesFor, type Catalog } from '../../lib/realestate/catalog';
import type { CatalogSummaryResponse, ListingsResponse, LookupsResponse } from './listings.dto';

function requireCatalog(): Catalog {
  const catalog = catalogStore.current();
  if (!catalog) {
    throw new RouteError(
      HttpStatusCodes.SERVICE_UNAVAILABLE,
      'No hay un inventario cargado. Carga uno con POST /api/listings/reload o /api/listings/upload'
    );
  }
  return catalog;
}

function summarize(catalog: Catalog, message: string): CatalogSummaryResponse {
  return {
    success: true,
    source: catalog.source,
    loadedAt: catalog.loadedAt.toISOString(),
    count: catalog.listings.length,
    message,
  };
}

function getListings(): ListingsResponse {
  const catalog = requireCatalog();
  return {
    source: catalog.source,
    loadedAt: catalog.loadedAt.toISOString(),
    count: catalog.listings.length,
    listings: catalog.listings,
  };
}

function getLookups(region?: string): LookupsResponse {
  const { lookups } = requireCatalog();
  return {
    regions: lookups.regions,
    communes: communesFor(lookups, region),
    communesByRegion: Object.fromEntries(lookups.communesByRegion),
    propertyTypes: lookups.propertyTypes,
    macrozones: lookups.macrozones,
  };
}

async function reloadListings(source?: string): Promise<CatalogSummaryResponse> {
  const target = source?.trim() || env.LISTINGS_SOURCE;
  const catalog = await catalogStore.reload(target);
  return summarize(catalog, `Inventario cargado: ${target}`);
}

function uploadListings(data: unknown, label = 'upload'): CatalogSummaryResponse {
  const catalog = catalogStore.replace(data, label);
  return summarize(catalog, `Inventario local cargado: ${label}`);
}

export default {
  requireCatalog,
  getListings,
  getLookups,
  reloadListings,
  uploadListings,
} as const;
