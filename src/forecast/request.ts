import { z } from "zod";

import { ValidationError } from "../lib/errors.js";
import { PRODUCTS } from "./products.js";

export const OUTPUT_FORMATS = ["json", "xml", "internal"] as const;
export const UNITS = ["metric", "british"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type Unit = (typeof UNITS)[number];

/**
 * Caller-supplied forecast parameters. Everything is checked at run time by
 * {@link parseForecastRequest}; `product`, `latitude` and `longitude` are
 * required there.
 */
export interface ForecastQuery {
  product?: string;
  latitude?: number;
  longitude?: number;
  /** `json` (default on `get`), `xml`, or `internal` for a PNG chart. */
  output?: string;
  unit?: string;
  /** `en`, `zh-CN` or `zh-TW`. */
  lang?: string;
  /** Hours from UTC. */
  tzshift?: number;
  /** Altitude correction in km for high sites, astro only. */
  altitudeCorrection?: number;
}

const LAT_MESSAGE = "lat between -90 and 90 expected";
const LON_MESSAGE = "lon between -180 and 180 expected";
const TZSHIFT_MESSAGE = "tzshift integer between -23 and 23 expected";

const forecastRequestSchema = z
  .object({
    product: z.enum(PRODUCTS, {
      errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined || ctx.data === "" ? "product was not defined" : "product not supported"
      })
    }),
    latitude: z
      .number({ required_error: LAT_MESSAGE, invalid_type_error: LAT_MESSAGE })
      .min(-90, LAT_MESSAGE)
      .max(90, LAT_MESSAGE),
    longitude: z
      .number({ required_error: LON_MESSAGE, invalid_type_error: LON_MESSAGE })
      .min(-180, LON_MESSAGE)
      .max(180, LON_MESSAGE),
    output: z
      .enum(OUTPUT_FORMATS, { errorMap: () => ({ message: "output must be one of json, xml, internal" }) })
      .optional(),
    unit: z.enum(UNITS, { errorMap: () => ({ message: "unit must be metric or british" }) }).optional(),
    lang: z
      .string({ invalid_type_error: "lang must be a language code" })
      .min(1, "lang must be a language code")
      .optional(),
    tzshift: z
      .number({ invalid_type_error: TZSHIFT_MESSAGE })
      .int(TZSHIFT_MESSAGE)
      .min(-23, TZSHIFT_MESSAGE)
      .max(23, TZSHIFT_MESSAGE)
      .optional(),
    altitudeCorrection: z
      .union([z.literal(0), z.literal(2), z.literal(7)], {
        errorMap: () => ({ message: "ac must be 0, 2 or 7" })
      })
      .optional()
  })
  .superRefine((request, ctx) => {
    if (request.altitudeCorrection !== undefined && request.product !== "astro") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["altitudeCorrection"],
        message: "ac is only available for the astro product"
      });
    }
  });

export type ForecastRequest = z.infer<typeof forecastRequestSchema>;

export function parseForecastRequest(query: ForecastQuery): ForecastRequest {
  const parsed = forecastRequestSchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && typeof issue.path[0] === "string" ? issue.path[0] : null;
    throw new ValidationError(issue?.message ?? "invalid forecast request", field);
  }

  return parsed.data;
}
