import logger from 'jet-logger';
import { createCatalog, type Catalog } from '../realestate/catalog';
import { prepareListings } from '../realestate/listing';
import { readJsonSource } from './inventory-source';

export type JsonReader = (source: string) => Promise<unknown>;

/**
 * Holds the active catalog for the HTTP layer.
 *
 * A new catalog is fully built before it replaces the current one, so a
 * failed load leaves the last good catalog in place and a search never sees
 * a half-loaded inventory.
 */
export class CatalogStore {
  private catalog: Catalog | null = null;

  constructor(private readonly readJson: JsonReader = (source) => readJsonSource(source)) {}

  current(): Catalog | null {
    return this.catalog;
  }

  async reload(source: string): Promise<Catalog> {
    try {
      const data = await this.readJson(source);
      return this.replace(data, source);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[CatalogStore] Could not load ${source}, keeping previous catalog: ${message}`);
      throw error;
    }
  }

  /**
   * @throws {ValidationError} and keeps the current catalog.
   */
  replace(data: unknown, source: string): Catalog {
    const next = createCatalog(prepareListings(data), source);
    this.catalog = next;
    logger.info(`[CatalogStore] Loaded ${next.listings.length} listings from ${source}`);
    return next;
  }

  clear(): void {
    this.catalog = null;
  }
}

export const catalogStore = new CatalogStore();
