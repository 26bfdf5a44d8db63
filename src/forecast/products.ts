export const PRODUCTS = ["astro", "two", "civil", "civillight", "meteo"] as const;

export type Product = (typeof PRODUCTS)[number];

/**
 * Forecast products served by 7Timer:
 * - `astro`: 3-day astronomy forecast in 3h steps (seeing, transparency)
 * - `two`: two week overview
 * - `civil`: 8-day forecast with a weather type per 3h step
 * - `civillight`: simplified per-day forecast for the next week
 * - `meteo`: detailed forecast with humidity and wind profile from 950hPa to 200hPa
 */
export function products(): Product[] {
  return [...PRODUCTS];
}

export function isProduct(value: unknown): value is Product {
  return typeof value === "string" && PRODUCTS.some((product) => product === value);
}
