/**
 * AgentCard discovery: well-known URL construction, bounded-retry fetch,
 * decoding and validation.
 */

import {
  A2aAccessDeniedError,
  A2aAgentCardInvalidError,
  A2aAgentCardNotFoundError,
  A2aCancelledError,
  A2aDecodeError,
  A2aDiscoveryFailedError,
  A2aHttpStatusError,
  isRetryableDiscoveryError,
  type ValidationIssue,
} from "@relaykit/errors";
import { LRUCache } from "lru-cache";
import { isHttpUrl, normalizeBaseUrl, readErrorBody, withDeadline } from "./http.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AgentCard, DiscovererConfig, Endpoint } from "./types.js";
import {
  AGENT_CARD_PATH,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_USER_AGENT,
  ENDPOINT_TYPES,
  isA2aMethod,
} from "./types.js";
import { deepFreeze } from "./utils/deep-freeze.js";
import { AgentCardWireSchema, DiscovererConfigSchema, toValidationIssues } from "./validation.js";

const ENDPOINT_TYPE_SET: ReadonlySet<string> = new Set(ENDPOINT_TYPES);

// ---------------------------------------------------------------------------
// URL construction
// ---------------------------------------------------------------------------

/**
 * Build the well-known AgentCard URL for an agent base address.
 *
 * The base is put through {@link normalizeBaseUrl} and the suffix is only
 * appended once, so the result is a fixed point:
 * `buildDiscoveryUrl(buildDiscoveryUrl(x)) === buildDiscoveryUrl(x)`.
 * Returns "" when the base is not a usable http(s) address.
 */
export function buildDiscoveryUrl(base: string): string {
  const normalized = normalizeBaseUrl(base);
  if (normalized === "") return "";

  const url = new URL(normalized);
  const path = url.pathname.replace(/\/+$/, "");
  url.pathname = path.endsWith(AGENT_CARD_PATH) ? path : `${path}${AGENT_CARD_PATH}`;
  return url.toString();
}

// ---------------------------------------------------------------------------
// Decoding and validation
// ---------------------------------------------------------------------------

function validateEndpoint(endpoint: Endpoint, index: number): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const prefix = `endpoints[${index}]`;

  if (endpoint.url.trim() === "") {
    issues.push({ field: `${prefix}.url`, message: "endpoint URL is required", code: "required" });
  } else if (!URL.canParse(endpoint.url)) {
    issues.push({
      field: `${prefix}.url`,
      message: "endpoint URL must be absolute",
      code: "invalid_url",
      value: endpoint.url,
    });
  } else if (!isHttpUrl(endpoint.url)) {
    issues.push({
      field: `${prefix}.url`,
      message: "endpoint URL must use http or https scheme",
      code: "invalid_scheme",
      value: endpoint.url,
    });
  }

  if (!ENDPOINT_TYPE_SET.has(endpoint.type)) {
    issues.push({
      field: `${prefix}.type`,
      message: `unsupported endpoint type "${endpoint.type}" (supported: ${ENDPOINT_TYPES.join(", ")})`,
      code: "invalid_type",
      value: endpoint.type,
    });
  } else if (endpoint.type === "a2a") {
    endpoint.methods.forEach((method, j) => {
      if (!isA2aMethod(method)) {
        issues.push({
          field: `${prefix}.methods[${j}]`,
          message: `invalid A2A method "${method}"`,
          code: "invalid_method",
          value: method,
        });
      }
    });
  }

  return issues;
}

/**
 * Check the semantic rules of an AgentCard.
 *
 * @throws {A2aAgentCardInvalidError} naming the first offending field and
 * listing every issue found
 */
export function validateAgentCard(card: AgentCard): void {
  const issues: ValidationIssue[] = [];

  if (card.name.trim() === "") {
    issues.push({ field: "name", message: "agent name is required", code: "required" });
  }
  if (card.version.trim() === "") {
    issues.push({ field: "version", message: "agent version is required", code: "required" });
  }
  card.endpoints.forEach((endpoint, i) => {
    issues.push(...validateEndpoint(endpoint, i));
  });

  const [first, ...rest] = issues;
  if (first !== undefined) {
    throw new A2aAgentCardInvalidError([first, ...rest]);
  }
}

/**
 * Decode an already-parsed JSON value into a validated, frozen AgentCard.
 *
 * @param source - URL or label used in error messages
 */
export function parseAgentCard(raw: unknown, source = "agent card"): AgentCard {
  const parsed = AgentCardWireSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    const first = issues[0];
    throw new A2aDecodeError(
      source,
      first !== undefined
        ? `unexpected AgentCard shape at ${first.field || "<root>"}: ${first.message}`
        : "unexpected AgentCard shape",
      { issues },
    );
  }

  const card: AgentCard = parsed.data;
  validateAgentCard(card);
  return deepFreeze(card);
}

/** Decode AgentCard JSON text */
export function decodeAgentCard(text: string, source = "agent card"): AgentCard {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new A2aDecodeError(source, "AgentCard body is not valid JSON", { cause: error });
  }
  return parseAgentCard(raw, source);
}

/**
 * Map a non-success AgentCard response to its error. 404 and 401/403 get
 * their own kinds; everything else is an HTTP status error.
 */
export async function cardResponseError(url: string, response: Response): Promise<Error> {
  if (response.status === 404) {
    return new A2aAgentCardNotFoundError(url);
  }
  if (response.status === 401 || response.status === 403) {
    return new A2aAccessDeniedError(url, response.status);
  }
  return new A2aHttpStatusError(url, response.status, await readErrorBody(response));
}

// ---------------------------------------------------------------------------
// AgentCardDiscoverer
// ---------------------------------------------------------------------------

export interface DiscovererOptions {
  readonly logger?: Logger | undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new A2aCancelledError("discovery", signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new A2aCancelledError("discovery", signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class AgentCardDiscoverer {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly userAgent: string;
  /** Validated cards keyed by discovery URL; absent when caching is off */
  private readonly cache: LRUCache<string, AgentCard> | undefined;
  private readonly logger: Logger;

  constructor(config?: DiscovererConfig, options?: DiscovererOptions) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    this.maxRetries = config?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.userAgent = config?.userAgent ?? DEFAULT_USER_AGENT;
    this.cache =
      config?.cacheTtlMs !== undefined && config.cacheTtlMs > 0
        ? new LRUCache<string, AgentCard>({
            max: config.cacheMaxEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
            ttl: config.cacheTtlMs,
          })
        : undefined;
    this.logger = options?.logger ?? createConsoleLogger("a2a:discovery");
  }

  /**
   * Fetch, decode and validate the AgentCard published by `agentUrl`.
   *
   * Transport failures and 5xx responses are retried up to `maxRetries`
   * times, `retryDelayMs` apart. 4xx responses, malformed bodies and
   * validation failures are surfaced on the first occurrence.
   */
  async discover(agentUrl: string, signal?: AbortSignal): Promise<AgentCard> {
    const cardUrl = buildDiscoveryUrl(agentUrl);
    if (!isHttpUrl(cardUrl)) {
      throw new A2aDiscoveryFailedError(agentUrl, 0, new Error("Invalid or empty agent URL"));
    }

    const cached = this.cache?.get(cardUrl);
    if (cached !== undefined) return cached;

    const attempts = this.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      this.logger.debug(`Fetching ${cardUrl} (attempt ${attempt}/${attempts})`);

      let body: string;
      try {
        body = await this.fetchCard(cardUrl, signal);
      } catch (error) {
        if (!isRetryableDiscoveryError(error)) throw error;
        if (attempt >= attempts) {
          throw new A2aDiscoveryFailedError(cardUrl, attempts, error);
        }
        this.logger.warn(
          `Attempt ${attempt}/${attempts} for ${cardUrl} failed: ${error.message}; retrying in ${this.retryDelayMs}ms`,
        );
        await sleep(this.retryDelayMs, signal);
        continue;
      }

      const card = decodeAgentCard(body, cardUrl);
      this.cache?.set(cardUrl, card);
      this.logger.info(`Discovered agent "${card.name}" v${card.version} at ${cardUrl}`);
      return card;
    }
  }

  /** Drop the cached card for an agent so the next discover() refetches it */
  invalidate(agentUrl: string): boolean {
    return this.cache?.delete(buildDiscoveryUrl(agentUrl)) ?? false;
  }

  clearCache(): void {
    this.cache?.clear();
  }

  private fetchCard(cardUrl: string, signal: AbortSignal | undefined): Promise<string> {
    return withDeadline(
      { url: cardUrl, operation: "discovery", timeoutMs: this.timeoutMs, signal },
      async (deadlineSignal) => {
        const response = await fetch(cardUrl, {
          method: "GET",
          headers: { Accept: "application/json", "User-Agent": this.userAgent },
          signal: deadlineSignal,
        });
        if (!response.ok) {
          throw await cardResponseError(cardUrl, response);
        }
        return await response.text();
      },
    );
  }
}

/**
 * Validate a discoverer config and build the discoverer.
 */
export function createDiscoverer(
  config?: DiscovererConfig,
  options?: DiscovererOptions,
): AgentCardDiscoverer {
  return new AgentCardDiscoverer(DiscovererConfigSchema.parse(config ?? {}), options);
}
