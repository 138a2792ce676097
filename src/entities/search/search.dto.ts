import type { SearchCriteria, SearchResult } from '../../lib/realestate/types';

export interface SearchResponse {
  success: boolean;
  source: string;
  criteria: SearchCriteria;
  total: number;
  results: SearchResult[];
  // Canonical query string of the form selection, for restoring it later
  query?: string;
  message?: string;
}
