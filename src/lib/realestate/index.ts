export * from './types';
export { ValidationError, RetrievalError } from './errors';
export { getMacrozone, foldDiacritics, MACROZONE_BY_REGION } from './geography';
export type { Macrozone } from './geography';
export { normalizeListing, prepareListings, REQUIRED_LISTING_FIELDS } from './listing';
export type { RawListing } from './listing';
export {
  buildCriteria,
  criteriaFromForm,
  effectiveMinAreaM2,
  parseLocaleNumber,
  SEARCH_FORM_FIELDS,
} from './criteria';
export type { RawCriteria, SearchFormField, SearchFormValues, AreaUnit } from './criteria';
export { matchesCriteria } from './filter';
export { scoreListing, transportAvailabilityScore, modeAvailability } from './scoring';
export { searchListings } from './search';
export { buildGeographyLookups, communesFor, createCatalog, searchCatalog } from './catalog';
export type { Catalog, GeographyLookups } from './catalog';
