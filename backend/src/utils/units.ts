import { roundTo } from "./geo";

export const celsiusToFahrenheit = (celsius: number) => roundTo((celsius * 9) / 5 + 32, 1);

export const kmhToMph = (kmh: number) => roundTo(kmh * 0.621371, 1);

export const msToMph = (metersPerSecond: number) => roundTo(metersPerSecond * 2.23694, 1);

export const kmToMiles = (km: number) => roundTo(km * 0.621371, 1);

export const metersToMiles = (meters: number) => roundTo(meters / 1609.344, 1);

export const metersToFeet = (meters: number) => Math.round(meters * 3.28084);

export const cmToInches = (cm: number) => roundTo(cm / 2.54, 1);
