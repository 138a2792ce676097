import { Request, Response } from 'express';
import logger from 'jet-logger';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import listingsService from './listings.service';
import { RouteError, toRouteError } from '@/other/errorHandler';
import { ReloadListingsRequest } from './listings.dto';

export async function getListings(_req: Request, res: Response) {
  res.status(HttpStatusCodes.OK).json(listingsService.getListings());
}

export async function getLookups(req: Request, res: Response) {
  const region = typeof req.query.region === 'string' ? req.query.region : undefined;
  res.status(HttpStatusCodes.OK).json(listingsService.getLookups(region));
}

export async function reloadListings(req: Request, res: Response) {
  try {
    const body: ReloadListingsRequest = req.body ?? {};

    if (body.source !== undefined && typeof body.source !== 'string') {
      throw new RouteError(HttpStatusCodes.BAD_REQUEST, 'Bad Request: "source" must be a string');
    }

    const result = await listingsService.reloadListings(body.source);

    res.status(HttpStatusCodes.OK).json(result);
  } catch (error) {
    logger.err(`[Listings] Reload failed: ${error instanceof Error ? error.message : String(error)}`);
    throw toRouteError(error, 'No se pudo cargar el inventario');
  }
}

export async function uploadListings(req: Request, res: Response) {
  try {
    const label = typeof req.query.name === 'string' && req.query.name ? req.query.name : 'upload';
    const result = listingsService.uploadListings(req.body, label);

    res.status(HttpStatusCodes.CREATED).json(result);
  } catch (error) {
    logger.err(`[Listings] Upload rejected: ${error instanceof Error ? error.message : String(error)}`);
    throw toRouteError(error, 'No se pudo leer el inventario');
  }
}
