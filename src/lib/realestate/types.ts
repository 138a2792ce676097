/**
 * Transport data reported by each inventory source. Recognized keys are
 * `carretera`, `distancia_km`, `ferrocarril` and `aeropuerto_km`; any other
 * key is treated as a presence flag.
 */
export type TransportData = Record<string, unknown>;

export interface Listing {
  readonly id: string;
  readonly name: string;
  readonly region: string;
  readonly province: string;
  readonly commune: string;
  readonly locality: string;
  readonly property_type: string;
  readonly area_m2: number;
  readonly price_per_m2: number;
  readonly zoning: string;
  readonly services: readonly string[];
  readonly transport: Readonly<TransportData>;
  readonly topography: string;
  readonly notes: string;
  readonly url: string;
  readonly macrozone: string;
  readonly total_price: number;
}

export interface SearchCriteria {
  readonly preferred_regions: readonly string[];
  readonly preferred_communes: readonly string[];
  readonly preferred_macrozones: readonly string[];
  readonly desired_property_types: readonly string[];
  readonly target_zonings: readonly string[];
  readonly min_area_m2: number;
  readonly min_area_hectares: number;
  readonly max_total_price: number | null;
  readonly max_price_per_m2: number | null;
  readonly required_services: readonly string[];
  readonly preferred_services: readonly string[];
  readonly transport_importance: Readonly<Record<string, number>>;
  readonly top: number;
}

export type ScoreFactor = 'ubicacion' | 'servicios' | 'precio' | 'conectividad' | 'superficie';

export type ScoreBreakdown = Record<ScoreFactor, number>;

export type LocationPreference =
  | 'Comuna preferida'
  | 'Comuna alternativa'
  | 'Región preferida'
  | 'Región alternativa'
  | 'Macrozona preferida'
  | 'Macrozona alternativa'
  | 'Sin preferencia';

export interface ScoreHighlights {
  area_m2: number;
  area_ha: number;
  precio_total_clp: number;
  precio_m2_clp: number;
  commune: string;
  region: string;
  macrozona: string;
  transporte: Readonly<TransportData>;
  servicios_cubiertos: string[];
  servicios_preferidos: string[];
  ubicacion: LocationPreference;
}

export interface ListingScore {
  score: number;
  breakdown: ScoreBreakdown;
  highlights: ScoreHighlights;
}

export interface SearchResult extends ListingScore {
  listing: Listing;
}
