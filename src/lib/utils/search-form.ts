import {
  SEARCH_FORM_FIELDS,
  type SearchFormField,
  type SearchFormValues,
} from '../realestate/criteria';

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.find((item): item is string => typeof item === 'string');
  return undefined;
}

/**
 * Pick the search form fields out of a parsed query object (e.g. Express
 * `req.query`). Repeated parameters keep their first value.
 */
export function formValuesFromQuery(query: Record<string, unknown>): SearchFormValues {
  const values: SearchFormValues = {};
  for (const field of SEARCH_FORM_FIELDS) {
    const value = firstString(query[field]);
    if (value !== undefined) values[field] = value;
  }
  return values;
}

/**
 * Restore the last used selection from a query string.
 */
export function restoreSearchFields(params: URLSearchParams): SearchFormValues {
  const values: SearchFormValues = {};
  SEARCH_FORM_FIELDS.forEach((field: SearchFormField) => {
    const value = params.get(field);
    if (value !== null) values[field] = value;
  });
  return values;
}

/**
 * Write the current selection into a query string. Empty fields are removed;
 * parameters that are not form fields (such as the inventory `data` URL) are
 * kept as they are.
 */
export function persistSearchParams(
  values: SearchFormValues,
  current: URLSearchParams = new URLSearchParams()
): URLSearchParams {
  const params = new URLSearchParams(current);
  for (const field of SEARCH_FORM_FIELDS) {
    const value = values[field]?.trim();
    if (value) {
      params.set(field, value);
    } else {
      params.delete(field);
    }
  }
  return params;
}
