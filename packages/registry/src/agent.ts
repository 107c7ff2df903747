import {
  type Agent,
  type AgentCard,
  type AgentCardDiscoverer,
  type AgentStatus,
  deepFreeze,
  normalizeBaseUrl,
} from "@relaykit/a2a";
import { RegistryAgentInvalidError } from "@relaykit/errors";
import type { AgentRegistry } from "./agent-registry.js";
import { type Clock, systemClock } from "./types.js";

export interface CreateAgentOptions {
  /** Base URL the card was discovered from; a missing scheme means http */
  readonly url: string;
  /** Defaults to deriveAgentId(card) */
  readonly id?: string | undefined;
  /** Defaults to "online" */
  readonly status?: AgentStatus | undefined;
  readonly clock?: Clock | undefined;
}

/**
 * Stable id for a card: `<name>@<version>`, lower-cased, with whitespace
 * runs collapsed to "-".
 */
export function deriveAgentId(card: AgentCard): string {
  return `${card.name}@${card.version}`.trim().toLowerCase().replace(/\s+/g, "-");
}

/** Build a frozen Agent record for a freshly discovered card */
export function createAgent(card: AgentCard, options: CreateAgentOptions): Agent {
  const url = normalizeBaseUrl(options.url);
  if (url === "") {
    throw new RegistryAgentInvalidError(`agent URL "${options.url}" is not an http(s) URL`);
  }

  const now = (options.clock ?? systemClock).now();
  return deepFreeze({
    id: options.id ?? deriveAgentId(card),
    name: card.name,
    url,
    card,
    status: options.status ?? "online",
    discoveredAt: now,
    lastSeen: now,
  });
}

/**
 * Discover the card at `url` and register the resulting agent.
 * Errors from discovery and registration propagate unchanged.
 */
export async function discoverAndRegister(
  discoverer: AgentCardDiscoverer,
  registry: AgentRegistry,
  url: string,
  options?: {
    readonly id?: string | undefined;
    readonly signal?: AbortSignal | undefined;
    readonly clock?: Clock | undefined;
  },
): Promise<Agent> {
  const card = await discoverer.discover(url, options?.signal);
  return registry.register(createAgent(card, { url, id: options?.id, clock: options?.clock }));
}
