import { describe, expect, it } from 'vitest';
import { criteriaFromForm } from '../realestate/criteria';
import { formValuesFromQuery, persistSearchParams, restoreSearchFields } from './search-form';

describe('formValuesFromQuery', () => {
  it('keeps form fields with string values', () => {
    const values = formValuesFromQuery({
      region: 'Maule',
      commune: ['Talca', 'Linares'],
      zoning: [1, 'ZI-1'],
      top: 3,
      data: 'inventario.json',
    });

    expect(values).toEqual({ region: 'Maule', commune: 'Talca', zoning: 'ZI-1' });
  });
});

describe('restoreSearchFields', () => {
  it('reads the saved selection from the query string', () => {
    const params = new URLSearchParams('region=Maule&min_area=1%2C5&area_unit=ha&data=inventario.json');

    expect(restoreSearchFields(params)).toEqual({ region: 'Maule', min_area: '1,5', area_unit: 'ha' });
  });

  it('keeps empty parameters as empty values', () => {
    expect(restoreSearchFields(new URLSearchParams('commune='))).toEqual({ commune: '' });
  });
});

describe('persistSearchParams', () => {
  it('sets filled fields, removes empty ones and keeps other parameters', () => {
    const current = new URLSearchParams('data=inv.json&commune=Talca');

    const params = persistSearchParams({ region: 'Maule', commune: '', top: '3' }, current);

    expect(params.toString()).toBe('data=inv.json&region=Maule&top=3');
    expect(current.toString()).toBe('data=inv.json&commune=Talca');
  });

  it('trims values', () => {
    expect(persistSearchParams({ property_type: '  Industrial ', zoning: '   ' }).toString()).toBe(
      'property_type=Industrial'
    );
  });

  it('round-trips through restoreSearchFields', () => {
    const values = { region: 'Ñuble', min_area: '2,5', area_unit: 'ha' };

    expect(restoreSearchFields(persistSearchParams(values))).toEqual(values);
  });
});

describe('macrozona form field', () => {
  it('restores a saved macrozona selection into the criteria', () => {
    const values = restoreSearchFields(new URLSearchParams('macrozona=Zona+Sur&region=&top=2'));

    expect(values).toEqual({ macrozona: 'Zona Sur', region: '', top: '2' });
    expect(criteriaFromForm(values).preferred_macrozones).toEqual(['Zona Sur']);
    expect(persistSearchParams(values).toString()).toBe('macrozona=Zona+Sur&top=2');
  });
});
