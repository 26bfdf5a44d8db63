import type { ForecastRequest } from "./request.js";

export type Scheme = "http" | "https";

export const API_HOST = "www.7timer.info";

// Plain decimal notation, never exponents such as `1e-7`.
function formatValue(value: string | number): string {
  const text = String(value);
  if (typeof value === "string" || !/e/i.test(text)) {
    return text;
  }

  return value.toFixed(12).replace(/\.?0+$/, "");
}

export function buildForecastUrl(scheme: Scheme, request: ForecastRequest): string {
  const url = new URL(`${scheme}://${API_HOST}/bin/${request.product}.php`);

  const query: Array<[string, string | number | undefined]> = [
    ["lat", request.latitude],
    ["lon", request.longitude],
    ["ac", request.altitudeCorrection],
    ["unit", request.unit],
    ["output", request.output],
    ["tzshift", request.tzshift],
    ["lang", request.lang]
  ];

  for (const [key, value] of query) {
    if (value !== undefined) {
      url.searchParams.set(key, formatValue(value));
    }
  }

  return url.toString();
}
