import { describe, expect, it } from 'vitest';

import {
  celsiusToFahrenheit,
  displayUnitsFor,
  fahrenheitToCelsius,
  kmToMiles,
  kmhToMph,
  kpaToPsi,
  milesToKm,
  psiToKpa,
  toDisplay,
} from '../src/utils/units';

describe('unit conversion', () => {
  it('converts distance and speed with the same factor', () => {
    expect(kmToMiles(100)).toBeCloseTo(62.1371, 4);
    expect(kmhToMph(50)).toBeCloseTo(31.06855, 5);
    expect(milesToKm(kmToMiles(42))).toBeCloseTo(42, 10);
  });

  it('converts temperature including the shared -40 point', () => {
    expect(celsiusToFahrenheit(20)).toBe(68);
    expect(celsiusToFahrenheit(-40)).toBe(-40);
    expect(fahrenheitToCelsius(212)).toBe(100);
  });

  it('converts tire pressure from kPa to psi', () => {
    expect(kpaToPsi(250)).toBeCloseTo(36.2595, 4);
    expect(psiToKpa(kpaToPsi(240))).toBeCloseTo(240, 10);
  });

  it('leaves metric values untouched', () => {
    expect(toDisplay('distance', 123.456, 'metric')).toBe(123.456);
    expect(toDisplay('temperature', -3.5, 'metric')).toBe(-3.5);
  });

  it('does not round imperial values', () => {
    expect(toDisplay('distance', 300, 'imperial')).toBeCloseTo(186.4113, 4);
    expect(toDisplay('pressure', 200, 'imperial')).toBeCloseTo(29.0076, 4);
  });

  it('names display units per system', () => {
    expect(displayUnitsFor('imperial')).toEqual({
      system: 'imperial',
      distance: 'mi',
      speed: 'mph',
      temperature: '°F',
      pressure: 'psi',
    });
    expect(displayUnitsFor('metric')).toEqual({
      system: 'metric',
      distance: 'km',
      speed: 'km/h',
      temperature: '°C',
      pressure: 'kPa',
    });
  });
});
