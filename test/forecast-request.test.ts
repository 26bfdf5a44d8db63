import { describe, expect, test } from "vitest";

import { PRODUCTS, isProduct, products } from "../src/forecast/products.js";
import { parseForecastRequest, type ForecastQuery } from "../src/forecast/request.js";
import { ValidationError } from "../src/lib/errors.js";

function validationFailure(query: ForecastQuery): ValidationError {
  try {
    parseForecastRequest(query);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a validation failure");
}

describe("products", () => {
  test("lists exactly the five forecast products", () => {
    expect(new Set(products())).toEqual(new Set(["astro", "two", "civil", "civillight", "meteo"]));
    expect(products()).toHaveLength(5);
  });

  test("returns a fresh copy each time", () => {
    const list = products();
    list.pop();
    expect(products()).toHaveLength(PRODUCTS.length);
  });

  test("narrows product codes", () => {
    expect(isProduct("civillight")).toBe(true);
    expect(isProduct("ASTRO")).toBe(false);
    expect(isProduct(7)).toBe(false);
  });
});

describe("parseForecastRequest", () => {
  test("accepts the required fields and leaves optional ones absent", () => {
    expect(parseForecastRequest({ product: "astro", latitude: 51.2, longitude: -1.8 })).toEqual({
      product: "astro",
      latitude: 51.2,
      longitude: -1.8
    });
  });

  test("accepts the coordinate bounds", () => {
    expect(() => parseForecastRequest({ product: "meteo", latitude: -90, longitude: 180 })).not.toThrow();
    expect(() => parseForecastRequest({ product: "meteo", latitude: 90, longitude: -180 })).not.toThrow();
  });

  test("rejects a missing or empty product", () => {
    expect(validationFailure({ latitude: 10, longitude: 10 }).message).toBe("product was not defined");
    expect(validationFailure({ product: "", latitude: 10, longitude: 10 }).message).toBe("product was not defined");
  });

  test("rejects products outside the registry", () => {
    for (const product of ["sun", "Astro", "civil-light"]) {
      const error = validationFailure({ product, latitude: 10, longitude: 10 });
      expect(error.message).toBe("product not supported");
      expect(error.field).toBe("product");
    }
  });

  test("rejects latitudes outside [-90, 90] or missing", () => {
    for (const latitude of [90.01, -91, Number.NaN, undefined]) {
      const error = validationFailure({ product: "civil", latitude, longitude: 0 });
      expect(error.message).toBe("lat between -90 and 90 expected");
      expect(error.field).toBe("latitude");
    }
  });

  test("rejects longitudes outside [-180, 180] or missing", () => {
    for (const longitude of [180.5, -181, Number.POSITIVE_INFINITY, undefined]) {
      const error = validationFailure({ product: "civil", latitude: 0, longitude });
      expect(error.message).toBe("lon between -180 and 180 expected");
      expect(error.field).toBe("longitude");
    }
  });

  test("reports the product before the coordinates", () => {
    expect(validationFailure({ product: "sun", latitude: 100, longitude: 200 }).message).toBe("product not supported");
  });

  test("validates optional parameters", () => {
    const base = { product: "astro", latitude: 0, longitude: 0 };
    expect(validationFailure({ ...base, output: "csv" }).message).toBe("output must be one of json, xml, internal");
    expect(validationFailure({ ...base, unit: "imperial" }).message).toBe("unit must be metric or british");
    expect(validationFailure({ ...base, lang: "" }).message).toBe("lang must be a language code");
    expect(validationFailure({ ...base, tzshift: 24 }).message).toBe("tzshift integer between -23 and 23 expected");
    expect(validationFailure({ ...base, tzshift: 1.5 }).message).toBe("tzshift integer between -23 and 23 expected");
    expect(validationFailure({ ...base, altitudeCorrection: 3 }).message).toBe("ac must be 0, 2 or 7");
  });

  test("only accepts an altitude correction for astro", () => {
    expect(parseForecastRequest({ product: "astro", latitude: 0, longitude: 0, altitudeCorrection: 7 })).toEqual({
      product: "astro",
      latitude: 0,
      longitude: 0,
      altitudeCorrection: 7
    });

    const error = validationFailure({ product: "civil", latitude: 0, longitude: 0, altitudeCorrection: 2 });
    expect(error.message).toBe("ac is only available for the astro product");
    expect(error.field).toBe("altitudeCorrection");
  });
});
