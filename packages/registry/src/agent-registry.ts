import {
  type Agent,
  type AgentStatus,
  deepFreeze,
  isDeepFrozen,
  type Logger,
  silentLogger,
} from "@relaykit/a2a";
import {
  RegistryAgentInvalidError,
  RegistryAgentNotFoundError,
  RegistryFullError,
} from "@relaykit/errors";
import { type Clock, DEFAULT_MAX_AGENTS, systemClock } from "./types.js";
import { mapDelete, mapPartition, mapSet } from "./utils/immutable-map.js";

export interface AgentRegistryOptions {
  readonly maxAgents?: number | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * In-memory store of discovered agents keyed by id.
 *
 * The map is replaced on every write and every stored Agent is frozen all
 * the way down, so `list()` snapshots and returned records can be shared
 * freely. All operations are synchronous.
 */
export class AgentRegistry {
  private agents: ReadonlyMap<string, Agent> = new Map();
  private readonly maxAgents: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options?: AgentRegistryOptions) {
    this.maxAgents = options?.maxAgents ?? DEFAULT_MAX_AGENTS;
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Insert or replace an agent. Replacing an existing id never counts
   * against `maxAgents`.
   *
   * A fully frozen record is stored as given. Anything else is copied,
   * card included, and the copy is frozen; the caller's objects stay
   * mutable and later changes to them do not reach the registry.
   */
  register(agent: Agent): Agent {
    if (agent.id.trim() === "") {
      throw new RegistryAgentInvalidError("agent id is required");
    }
    if (!this.agents.has(agent.id) && this.agents.size >= this.maxAgents) {
      throw new RegistryFullError(this.maxAgents);
    }

    const stored = isDeepFrozen(agent)
      ? agent
      : deepFreeze({ ...agent, card: structuredClone(agent.card) });
    this.agents = mapSet(this.agents, stored.id, stored);
    this.logger.info(`Registered agent ${stored.id} (${stored.url})`);
    return stored;
  }

  unregister(agentId: string): void {
    if (!this.agents.has(agentId)) {
      throw new RegistryAgentNotFoundError(agentId);
    }
    this.agents = mapDelete(this.agents, agentId);
    this.logger.info(`Unregistered agent ${agentId}`);
  }

  get(agentId: string): Agent {
    const agent = this.agents.get(agentId);
    if (agent === undefined) {
      throw new RegistryAgentNotFoundError(agentId);
    }
    return agent;
  }

  has(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  /** Point-in-time snapshot; later writes do not affect it */
  list(): readonly Agent[] {
    return [...this.agents.values()];
  }

  /**
   * Online agents whose card sets capability `name` to true.
   * Unknown capability names match nothing.
   */
  findByCapability(name: string): readonly Agent[] {
    const matches: Agent[] = [];
    for (const agent of this.agents.values()) {
      if (agent.status !== "online") continue;
      if (agent.card.capabilities[name] === true) {
        matches.push(agent);
      }
    }
    return matches;
  }

  /** Set an agent's status and refresh its `lastSeen` */
  updateStatus(agentId: string, status: AgentStatus): Agent {
    const current = this.get(agentId);
    const updated: Agent = deepFreeze({ ...current, status, lastSeen: this.clock.now() });
    this.agents = mapSet(this.agents, agentId, updated);
    this.logger.debug(`Agent ${agentId} status ${current.status} -> ${status}`);
    return updated;
  }

  /**
   * Remove every agent silent for longer than `thresholdMs` and return
   * them. An agent seen exactly `thresholdMs` ago is kept.
   */
  evictStale(thresholdMs: number): readonly Agent[] {
    const now = this.clock.now();
    const { kept, removed } = mapPartition(
      this.agents,
      (_id, agent) => now - agent.lastSeen > thresholdMs,
    );
    if (removed.length > 0) {
      this.agents = kept;
    }
    return removed;
  }

  get size(): number {
    return this.agents.size;
  }

  clear(): void {
    this.agents = new Map();
  }
}
