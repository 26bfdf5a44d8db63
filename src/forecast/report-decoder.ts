import { XMLParser } from "fast-xml-parser";
import { z } from "zod";

import { ReportDecodeError } from "../lib/errors.js";

/**
 * Decoded report tree. The five products return differently shaped payloads,
 * so documents are kept generic rather than typed per product.
 */
export type ReportValue = null | boolean | number | string | ReportValue[] | ReportDocument;

export type ReportDocument = { [key: string]: ReportValue };

const reportValueSchema: z.ZodType<ReportValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(reportValueSchema),
    z.record(z.string(), reportValueSchema)
  ])
);

const reportDocumentSchema = z.record(z.string(), reportValueSchema);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: "content",
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true
});

function isDocument(value: ReportValue | undefined): value is ReportDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeJsonReport(body: string): ReportDocument {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new ReportDecodeError("json", error instanceof Error ? error.message : String(error), error);
  }

  const parsed = reportDocumentSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ReportDecodeError("json", "expected an object at the top level", parsed.error);
  }

  return parsed.data;
}

// Attributes and child elements of the root element become the document's keys.
export function decodeXmlReport(body: string): ReportDocument {
  let decoded: unknown;
  try {
    decoded = xmlParser.parse(body, true);
  } catch (error) {
    throw new ReportDecodeError("xml", error instanceof Error ? error.message : String(error), error);
  }

  const parsed = reportDocumentSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ReportDecodeError("xml", "unexpected document structure", parsed.error);
  }

  const roots = Object.values(parsed.data);
  if (roots.length !== 1) {
    throw new ReportDecodeError("xml", `expected one root element, found ${roots.length}`);
  }

  const root = roots[0];
  if (!isDocument(root)) {
    throw new ReportDecodeError("xml", "root element has no attributes or children");
  }

  return root;
}

/**
 * Decodes a response body according to the requested `output` format.
 * Formats without a decoder (`internal` charts among them) are returned as
 * `{ data: body }`.
 */
export function decodeReport(body: string, output: string): ReportDocument {
  if (output === "json") {
    return decodeJsonReport(body);
  }

  if (output === "xml") {
    return decodeXmlReport(body);
  }

  return { data: body };
}
