import type { SearchResult } from '../realestate/types';

const currencyFormatter = new Intl.NumberFormat('es-CL', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(value: number): string {
  return currencyFormatter.format(value);
}

export const RESULT_SEPARATOR = '-'.repeat(60);

export const NO_RESULTS_MESSAGE = 'No se encontraron terrenos que cumplan con los criterios.';

function listOrNA(values: readonly string[]): string {
  return values.join(', ') || 'N/A';
}

/**
 * Plain-text block describing one ranked listing.
 */
export function formatResult(result: SearchResult): string {
  const { listing, highlights } = result;
  return [
    `${listing.id} - ${listing.name} (${listing.region}, ${listing.commune})`,
    `  Score: ${result.score.toFixed(3)}`,
    `  Localidad: ${listing.locality}, ${listing.province}`,
    `  Superficie: ${highlights.area_m2.toFixed(0)} m² (${highlights.area_ha.toFixed(2)} ha)`,
    `  Precio total: $${formatCurrency(highlights.precio_total_clp)} CLP`,
    `  Precio/m²: $${formatCurrency(highlights.precio_m2_clp)} CLP`,
    `  Servicios clave: ${listOrNA(highlights.servicios_cubiertos)}`,
    `  Servicios preferidos: ${listOrNA(highlights.servicios_preferidos)}`,
    `  Transporte: ${JSON.stringify(highlights.transporte)}`,
    `  Observaciones: ${listing.notes}`,
    `  Publicación: ${listing.url || 'N/D'}`,
  ].join('\n');
}

export function formatResults(results: readonly SearchResult[]): string {
  if (!results.length) return NO_RESULTS_MESSAGE;
  return [
    'Terrenos sugeridos:\n',
    ...results.map((result) => `${formatResult(result)}\n${RESULT_SEPARATOR}`),
  ].join('\n');
}
