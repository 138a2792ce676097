import { UNKNOWN_MACROZONE } from '@/config/constants';

export type Macrozone =
  | 'Norte Grande'
  | 'Norte Chico'
  | 'Zona Centro'
  | 'Zona Centro-Sur'
  | 'Zona Sur'
  | 'Zona Austral';

export const MACROZONE_BY_REGION: Readonly<Record<string, Macrozone>> = {
  'Arica y Parinacota': 'Norte Grande',
  'Tarapacá': 'Norte Grande',
  'Tarapaca': 'Norte Grande',
  'Antofagasta': 'Norte Grande',
  'Atacama': 'Norte Chico',
  'Coquimbo': 'Norte Chico',
  'Valparaíso': 'Zona Centro',
  'Valparaiso': 'Zona Centro',
  'Metropolitana de Santiago': 'Zona Centro',
  'Región Metropolitana de Santiago': 'Zona Centro',
  'Metropolitana': 'Zona Centro',
  "Libertador General Bernardo O'Higgins": 'Zona Centro',
  'Libertador General Bernardo O’Higgins': 'Zona Centro',
  "O'Higgins": 'Zona Centro',
  'O’Higgins': 'Zona Centro',
  'Maule': 'Zona Centro-Sur',
  'Ñuble': 'Zona Sur',
  'Nuble': 'Zona Sur',
  'Biobío': 'Zona Sur',
  'Biobio': 'Zona Sur',
  'Bío Bío': 'Zona Sur',
  'La Araucanía': 'Zona Sur',
  'La Araucania': 'Zona Sur',
  'Los Ríos': 'Zona Sur',
  'Los Rios': 'Zona Sur',
  'Los Lagos': 'Zona Austral',
  'Aysén del General Carlos Ibáñez del Campo': 'Zona Austral',
  'Aysen del General Carlos Ibanez del Campo': 'Zona Austral',
  'Aysén': 'Zona Austral',
  'Magallanes y de la Antártica Chilena': 'Zona Austral',
  'Magallanes y de la Antartica Chilena': 'Zona Austral',
  'Magallanes': 'Zona Austral',
};

/**
 * Remove accents so spelling variants of the same region compare equal.
 */
export function foldDiacritics(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/ñ/g, 'n')
    .replace(/Ñ/g, 'N');
}

const MACROZONE_BY_FOLDED_REGION = new Map<string, Macrozone>(
  Object.entries(MACROZONE_BY_REGION).map(([region, zone]) => [foldDiacritics(region), zone])
);

export function getMacrozone(region: string | null | undefined): Macrozone | typeof UNKNOWN_MACROZONE {
  if (!region) return UNKNOWN_MACROZONE;

  if (Object.prototype.hasOwnProperty.call(MACROZONE_BY_REGION, region)) {
    return MACROZONE_BY_REGION[region];
  }

  return MACROZONE_BY_FOLDED_REGION.get(foldDiacritics(region)) ?? UNKNOWN_MACROZONE;
}
