export { SevenTimerClient } from "./integrations/seven-timer-client.js";
export { DEFAULT_USER_AGENT, parseClientConfig } from "./config/client-config.js";
export type { ClientConfig, ClientOptions } from "./config/client-config.js";
export { PRODUCTS, isProduct, products } from "./forecast/products.js";
export type { Product } from "./forecast/products.js";
export { OUTPUT_FORMATS, UNITS, parseForecastRequest } from "./forecast/request.js";
export type { ForecastQuery, ForecastRequest, OutputFormat, Unit } from "./forecast/request.js";
export { API_HOST, buildForecastUrl } from "./forecast/url-builder.js";
export type { Scheme } from "./forecast/url-builder.js";
export { decodeJsonReport, decodeReport, decodeXmlReport } from "./forecast/report-decoder.js";
export type { ReportDocument, ReportValue } from "./forecast/report-decoder.js";
export { FetchHttpClient, MAX_TIMEOUT_SECONDS, statusLine, timeoutMilliseconds } from "./http/http-client.js";
export type { FetchLike, HttpClient, HttpResponse } from "./http/http-client.js";
export { ReportDecodeError, RequestFailedError, SevenTimerError, ValidationError } from "./lib/errors.js";
export type { ReportFormat } from "./lib/errors.js";
export { createLogger, logger } from "./lib/logger.js";
export type { LogContext, LogLevel, Logger } from "./lib/logger.js";
export { VERSION } from "./version.js";
