
import { Request, Response } from 'express';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import searchService from './search.service';
import { RouteError } from '@/other/errorHandler';
import { formValuesFromQuery } from '../../lib/utils/search-form';

/**
 * Search with the form fields sent as query parameters
 * (region, commune, property_type, min_area, area_unit, ...).
 */
export async function searchByQuery(req: Request, res: Response) {
  const values = formValuesFromQuery(req.query);

  res.status(HttpStatusCodes.OK).json(searchService.searchFromForm(values));
}

/**
 * Search with a criteria document, the same shape as a criteria JSON file.
 */
export async function searchByCriteria(req: Request, res: Response) {
  const body: unknown = req.body;

  if (body !== undefined && (typeof body !== 'object' || body === null || Array.isArray(body))) {
    throw new RouteError(HttpStatusCodes.BAD_REQUEST, 'Bad Request: criteria must be a JSON object');
  }

  res.status(HttpStatusCodes.OK).json(searchService.searchFromCriteria(body ?? {}));
}
