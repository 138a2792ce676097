import { describe, it, expect } from 'vitest';
import {
  buildCriteria,
  criteriaFromForm,
  effectiveMinAreaM2,
  parseLocaleNumber,
  splitList,
} from './criteria';

describe('buildCriteria', () => {
  it('defaults to no constraints', () => {
    expect(buildCriteria({})).toEqual({
      preferred_regions: [],
      preferred_communes: [],
      preferred_macrozones: [],
      desired_property_types: [],
      target_zonings: [],
      min_area_m2: 0,
      min_area_hectares: 0,
      max_total_price: null,
      max_price_per_m2: null,
      required_services: [],
      preferred_services: [],
      transport_importance: {},
      top: 5,
    });
  });

  it('treats non-record input as empty criteria', () => {
    expect(buildCriteria(null).top).toBe(5);
    expect(buildCriteria([1, 2]).preferred_regions).toEqual([]);
  });

  it('coerces list fields', () => {
    const criteria = buildCriteria({
      preferred_regions: ['Maule', ' ', null, 'Ñuble '],
      preferred_communes: 'Talca; Curicó, Linares',
      desired_property_types: 7,
      required_services: { agua: true },
    });

    expect(criteria.preferred_regions).toEqual(['Maule', 'Ñuble']);
    expect(criteria.preferred_communes).toEqual(['Talca', 'Curicó', 'Linares']);
    expect(criteria.desired_property_types).toEqual(['7']);
    expect(criteria.required_services).toEqual([]);
  });

  it('treats zero or invalid ceilings as absent', () => {
    const criteria = buildCriteria({ max_total_price: 0, max_price_per_m2: 'mucho' });

    expect(criteria.max_total_price).toBeNull();
    expect(criteria.max_price_per_m2).toBeNull();
    expect(buildCriteria({ max_total_price: '2500000' }).max_total_price).toBe(2500000);
  });

  it('keeps only non-negative finite transport weights', () => {
    const criteria = buildCriteria({
      transport_importance: { carretera: 0.5, ferrocarril: '0.3', aeropuerto: -1, puerto: 'x' },
    });

    expect(criteria.transport_importance).toEqual({ carretera: 0.5, ferrocarril: 0.3 });
  });

  it('truncates top and falls back to the default', () => {
    expect(buildCriteria({ top: 3.9 }).top).toBe(3);
    expect(buildCriteria({ top: 0 }).top).toBe(5);
    expect(buildCriteria({ top: -2 }).top).toBe(5);
    expect(buildCriteria({ top: '10' }).top).toBe(10);
  });

  it('lets hectares win over square meters', () => {
    const criteria = buildCriteria({ min_area_m2: 5000, min_area_hectares: 1 });

    expect(criteria.min_area_m2).toBe(0);
    expect(criteria.min_area_hectares).toBe(1);
    expect(effectiveMinAreaM2(criteria)).toBe(10000);
  });

  it('reads a unit-tagged minimum area', () => {
    expect(buildCriteria({ min_area: 2, area_unit: 'ha' })).toMatchObject({
      min_area_m2: 0,
      min_area_hectares: 2,
    });
    expect(buildCriteria({ min_area: 800 })).toMatchObject({
      min_area_m2: 800,
      min_area_hectares: 0,
    });
  });

  it('prefers the unit-tagged value over a stale m² value', () => {
    const criteria = buildCriteria({ min_area_m2: 5000, min_area: 1, area_unit: 'ha' });

    expect(criteria.min_area_hectares).toBe(1);
    expect(criteria.min_area_m2).toBe(0);
    expect(effectiveMinAreaM2(criteria)).toBe(10000);
  });

  it('treats negative areas as no constraint', () => {
    const criteria = buildCriteria({ min_area_m2: -50, min_area_hectares: -1 });

    expect(effectiveMinAreaM2(criteria)).toBe(0);
  });

  it('returns frozen criteria', () => {
    expect(Object.isFrozen(buildCriteria({}))).toBe(true);
  });
});

describe('effectiveMinAreaM2', () => {
  it('uses the larger of both thresholds', () => {
    expect(effectiveMinAreaM2({ min_area_m2: 25000, min_area_hectares: 2 })).toBe(25000);
    expect(effectiveMinAreaM2({ min_area_m2: 5000, min_area_hectares: 2 })).toBe(20000);
    expect(effectiveMinAreaM2({ min_area_m2: 5000, min_area_hectares: 0 })).toBe(5000);
  });
});

describe('parseLocaleNumber', () => {
  it('reads thousands dots and decimal commas', () => {
    expect(parseLocaleNumber('2.500.000.000')).toBe(2500000000);
    expect(parseLocaleNumber('1,5')).toBe(1.5);
    expect(parseLocaleNumber(' 12 000 ')).toBe(12000);
  });

  it('returns null for blanks and garbage', () => {
    expect(parseLocaleNumber('')).toBeNull();
    expect(parseLocaleNumber('   ')).toBeNull();
    expect(parseLocaleNumber(undefined)).toBeNull();
    expect(parseLocaleNumber('diez')).toBeNull();
  });
});

describe('splitList', () => {
  it('splits on commas and semicolons', () => {
    expect(splitList('agua, luz;; gas ')).toEqual(['agua', 'luz', 'gas']);
  });
});

describe('criteriaFromForm', () => {
  it('turns single fields into one-element lists', () => {
    const criteria = criteriaFromForm({
      region: ' Maule ',
      commune: '',
      property_type: 'Agrícola',
      macrozona: 'Zona Centro-Sur',
      zoning: 'ZI-1',
    });

    expect(criteria.preferred_regions).toEqual(['Maule']);
    expect(criteria.preferred_communes).toEqual([]);
    expect(criteria.desired_property_types).toEqual(['Agrícola']);
    expect(criteria.preferred_macrozones).toEqual(['Zona Centro-Sur']);
    expect(criteria.target_zonings).toEqual(['ZI-1']);
  });

  it('parses locale numbers for area and prices', () => {
    const criteria = criteriaFromForm({
      min_area: '1,5',
      area_unit: 'ha',
      max_price: '2.500.000.000',
      max_price_m2: '0',
    });

    expect(criteria.min_area_hectares).toBe(1.5);
    expect(criteria.min_area_m2).toBe(0);
    expect(criteria.max_total_price).toBe(2500000000);
    expect(criteria.max_price_per_m2).toBeNull();
  });

  it('defaults the unit to square meters', () => {
    const criteria = criteriaFromForm({ min_area: '3.000', area_unit: 'acres' });

    expect(criteria.min_area_m2).toBe(3000);
    expect(criteria.min_area_hectares).toBe(0);
  });

  it('splits service lists and reads top', () => {
    const criteria = criteriaFromForm({
      required_services: 'Electricidad, Agua potable',
      preferred_services: 'Gas natural',
      top: '3',
    });

    expect(criteria.required_services).toEqual(['Electricidad', 'Agua potable']);
    expect(criteria.preferred_services).toEqual(['Gas natural']);
    expect(criteria.transport_importance).toEqual({});
    expect(criteria.top).toBe(3);
  });

  it('returns default criteria for an empty form', () => {
    expect(criteriaFromForm({})).toEqual(buildCriteria({}));
  });
});
