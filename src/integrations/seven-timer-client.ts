import type { ClientConfig, ClientOptions } from "../config/client-config.js";
import { parseClientConfig } from "../config/client-config.js";
import { decodeReport, type ReportDocument } from "../forecast/report-decoder.js";
import { parseForecastRequest, type ForecastQuery } from "../forecast/request.js";
import { buildForecastUrl } from "../forecast/url-builder.js";
import { FetchHttpClient, type HttpClient, type HttpResponse } from "../http/http-client.js";
import { RequestFailedError } from "../lib/errors.js";
import { logger as defaultLogger, type Logger } from "../lib/logger.js";

/**
 * Client for the 7Timer.info forecast API.
 *
 * ```ts
 * const client = new SevenTimerClient();
 * const report = await client.getReport({ product: "astro", latitude: 51.2, longitude: -1.8 });
 * ```
 *
 * Instances mutate their transport's agent and timeout on every call, so use
 * one per sequence of requests rather than sharing it across concurrent ones.
 */
export class SevenTimerClient {
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private httpClient: HttpClient | null;

  constructor(options: ClientOptions = {}) {
    this.config = parseClientConfig(options);
    this.logger = options.logger ?? defaultLogger;
    this.httpClient = options.httpClient ?? null;
  }

  /**
   * Fetches the forecast and returns the response as is, whatever its status,
   * so callers can handle failed requests themselves.
   */
  async getResponse(query: ForecastQuery): Promise<HttpResponse> {
    const request = parseForecastRequest(query);
    const url = buildForecastUrl(this.config.scheme, request);

    if (!this.httpClient) {
      this.httpClient = new FetchHttpClient();
    }

    this.httpClient.agent = this.config.userAgent;
    this.httpClient.timeoutSeconds = this.config.timeoutSeconds;

    this.logger.debug("Requesting 7Timer forecast", { product: request.product, url });
    return this.httpClient.get(url);
  }

  /** Returns the report body (JSON or XML text) without decoding it. */
  async getRaw(query: ForecastQuery): Promise<string> {
    const response = await this.fetchSuccessful(withGetDefaults(query));
    return response.body;
  }

  /**
   * Returns the report decoded according to `output`: JSON and XML become a
   * document tree, any other format is wrapped as `{ data: body }`.
   */
  async getReport(query: ForecastQuery): Promise<ReportDocument> {
    const resolved = withGetDefaults(query);
    const response = await this.fetchSuccessful(resolved);
    return decodeReport(response.body, resolved.output);
  }

  private async fetchSuccessful(query: ForecastQuery): Promise<HttpResponse> {
    const response = await this.getResponse(query);
    if (!response.ok) {
      this.logger.warn("7Timer request failed", {
        url: response.url,
        status: response.status,
        statusLine: response.statusLine
      });
      throw new RequestFailedError(response.status, response.statusLine, response.url);
    }

    return response;
  }
}

function withGetDefaults(query: ForecastQuery): ForecastQuery & { output: string; lang: string } {
  return {
    ...query,
    lang: query.lang || "en",
    output: query.output || "json"
  };
}
