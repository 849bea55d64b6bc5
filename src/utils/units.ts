export const KM_TO_MILES = 0.621371;
export const KPA_TO_PSI = 0.145038;

export type UnitSystem = 'imperial' | 'metric';

export type Quantity = 'distance' | 'speed' | 'temperature' | 'pressure';

export type DisplayUnits = {
  system: UnitSystem;
  distance: 'mi' | 'km';
  speed: 'mph' | 'km/h';
  temperature: '°F' | '°C';
  pressure: 'psi' | 'kPa';
};

export const kmToMiles = (km: number): number => km * KM_TO_MILES;

export const milesToKm = (miles: number): number => miles / KM_TO_MILES;

export const kmhToMph = (kmh: number): number => kmh * KM_TO_MILES;

export const mphToKmh = (mph: number): number => mph / KM_TO_MILES;

export const celsiusToFahrenheit = (celsius: number): number => (celsius * 9) / 5 + 32;

export const fahrenheitToCelsius = (fahrenheit: number): number => ((fahrenheit - 32) * 5) / 9;

export const kpaToPsi = (kpa: number): number => kpa * KPA_TO_PSI;

export const psiToKpa = (psi: number): number => psi / KPA_TO_PSI;

const imperialConverters: Record<Quantity, (value: number) => number> = {
  distance: kmToMiles,
  speed: kmhToMph,
  temperature: celsiusToFahrenheit,
  pressure: kpaToPsi,
};

/**
 * Converts a metric upstream value into the display system. Never rounds; formatting is
 * left to whoever renders the value.
 */
export const toDisplay = (quantity: Quantity, value: number, system: UnitSystem): number =>
  system === 'imperial' ? imperialConverters[quantity](value) : value;

export const displayUnitsFor = (system: UnitSystem): DisplayUnits =>
  system === 'imperial'
    ? { system, distance: 'mi', speed: 'mph', temperature: '°F', pressure: 'psi' }
    : { system, distance: 'km', speed: 'km/h', temperature: '°C', pressure: 'kPa' };
