import { z } from "zod";

import { MAX_TIMEOUT_SECONDS, type HttpClient } from "../http/http-client.js";
import { ValidationError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { VERSION } from "../version.js";

export const DEFAULT_USER_AGENT = `seventimer-client/${VERSION}`;

const clientConfigSchema = z.object({
  scheme: z.enum(["http", "https"]).default("https"),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(30),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT)
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

export type ClientOptions = z.input<typeof clientConfigSchema> & {
  /** Preconfigured transport. A fetch-based one is created on first use otherwise. */
  httpClient?: HttpClient;
  logger?: Logger;
};

export function parseClientConfig(options: ClientOptions): ClientConfig {
  const parsed = clientConfigSchema.safeParse({
    scheme: options.scheme,
    timeoutSeconds: options.timeoutSeconds,
    userAgent: options.userAgent
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && typeof issue.path[0] === "string" ? issue.path[0] : null;
    throw new ValidationError(`Invalid client options: ${parsed.error.message}`, field);
  }

  return parsed.data;
}
