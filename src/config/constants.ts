export const UNKNOWN_MACROZONE = 'Zona Desconocida'
export const DEFAULT_TOP = 5
export const SQUARE_METERS_PER_HECTARE = 10_000

// Scoring weights (max contribution of each factor)
export const SCORE_WEIGHTS = {
  ubicacion: 0.25,
  servicios: 0.4,
  precio: 0.2,
  conectividad: 0.15,
  superficie: 0.2,
} as const;

export const LOCATION_VALUES = {
  preferred: 1.0,
  alternativeCommune: 0.3,
  alternativeRegion: 0.4,
  preferredMacrozone: 0.9,
  alternativeMacrozone: 0.5,
  noPreference: 0.7,
} as const;

export const REQUIRED_SERVICES_SHARE = 0.6
export const PREFERRED_SERVICES_SHARE = 0.4
export const PREFERRED_SERVICES_DEFAULT = 0.5

export const PRICE_DEFAULT = 0.6
export const PRICE_RATIO_CAP = 1.5 // price above 1.5x the ceiling scores 0

export const CONNECTIVITY_DEFAULT = 0.6
export const ROAD_DISTANCE_LIMIT_KM = 10
export const ROAD_PRESENT_VALUE = 0.7
export const RAIL_UNKNOWN_VALUE = 0.5
export const AIRPORT_DISTANCE_LIMIT_KM = 50
export const OTHER_MODE_VALUE = 0.5

export const AREA_SATURATION_FACTOR = 4 // 4x the minimum area maxes out the factor

// Recognized transport keys
export const TRANSPORT_KEYS = {
  road: 'carretera',
  roadDistance: 'distancia_km',
  rail: 'ferrocarril',
  airport: 'aeropuerto',
  airportDistance: 'aeropuerto_km',
} as const;
