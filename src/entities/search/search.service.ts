import listingsService from '../listings/listings.service';
import { searchCatalog } from '../../lib/realestate/catalog';
import { buildCriteria, criteriaFromForm, type SearchFormValues } from '../../lib/realestate/criteria';
import type { SearchCriteria } from '../../lib/realestate/types';
import { NO_RESULTS_MESSAGE } from '../../lib/utils/format-result';
import { persistSearchParams } from '../../lib/utils/search-form';
import type { SearchResponse } from './search.dto';

function runSearch(criteria: SearchCriteria): SearchResponse {
  const catalog = listingsService.requireCatalog();
  const results = searchCatalog(catalog, criteria);

  return {
    success: true,
    source: catalog.source,
    criteria,
    total: results.length,
    results,
    ...(results.length ? {} : { message: NO_RESULTS_MESSAGE }),
  };
}

function searchFromForm(values: SearchFormValues): SearchResponse {
  return {
    ...runSearch(criteriaFromForm(values)),
    query: persistSearchParams(values).toString(),
  };
}

function searchFromCriteria(raw: unknown): SearchResponse {
  return runSearch(buildCriteria(raw));
}

export default {
  searchFromForm,
  searchFromCriteria,
} as const;
