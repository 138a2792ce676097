import axios from 'axios';
import { readFile } from 'fs/promises';
import path from 'path';
import env from '@/config/env';
import { RetrievalError } from '../realestate/errors';
import { prepareListings } from '../realestate/listing';
import type { Listing } from '../realestate/types';

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source.trim());
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response
      ? `${error.response.status} ${error.response.statusText}`
      : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

async function readText(source: string, timeoutMs: number): Promise<string> {
  if (isRemoteSource(source)) {
    const response = await axios.get<string>(source.trim(), {
      timeout: timeoutMs,
      responseType: 'text',
      headers: { 'Cache-Control': 'no-store' },
    });
    return response.data;
  }
  return readFile(path.resolve(source), 'utf8');
}

/**
 * Fetch a URL or read a local file and parse it as JSON.
 *
 * @throws {RetrievalError} when the source cannot be read or is not JSON.
 */
export async function readJsonSource(source: string, timeoutMs = env.FETCH_TIMEOUT_MS): Promise<unknown> {
  let text: string;
  try {
    text = await readText(source, timeoutMs);
  } catch (error) {
    throw new RetrievalError(
      source,
      `No se pudo cargar el inventario: ${describeError(error)}`,
      { cause: error }
    );
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new RetrievalError(
      source,
      `No se pudo leer el inventario: ${describeError(error)}`,
      { cause: error }
    );
  }
}

/**
 * Read a source and normalize every listing in it.
 *
 * @throws {RetrievalError | ValidationError}
 */
export async function loadInventory(source: string, timeoutMs?: number): Promise<Listing[]> {
  return prepareListings(await readJsonSource(source, timeoutMs));
}
