/**
 * Types and defaults for @relaykit/registry
 */

import type { Agent, AgentStatus } from "@relaykit/a2a";

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

/** Time source. Tests inject a fake for deterministic timestamps. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface RegistryConfig {
  /** Maximum number of distinct agents held (default: 100) */
  readonly maxAgents?: number | undefined;
  /** How often the stale sweep runs, in ms (default: 60_000) */
  readonly cleanupIntervalMs?: number | undefined;
  /** Silence after which an agent is evicted, in ms (default: 600_000) */
  readonly staleThresholdMs?: number | undefined;
  /** How often every agent is probed, in ms (default: 30_000) */
  readonly healthCheckIntervalMs?: number | undefined;
  /** Deadline for a single probe, in ms (default: 10_000) */
  readonly healthCheckTimeoutMs?: number | undefined;
}

export const DEFAULT_MAX_AGENTS = 100;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;
export const DEFAULT_STALE_THRESHOLD_MS = 600_000;
export const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 30_000;
export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** Emitted once per agent removed by a stale sweep */
export interface StaleEvictionEvent {
  readonly agent: Agent;
  /** Epoch ms at which the sweep ran */
  readonly evictedAt: number;
  /** How long the agent had been silent, in ms */
  readonly silentForMs: number;
}

/** Emitted when a health check moves an agent to a new status */
export interface StatusChangeEvent {
  readonly agentId: string;
  readonly previous: AgentStatus;
  readonly current: AgentStatus;
  /** The probe failure behind a move away from `online` */
  readonly error?: unknown;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

/**
 * Liveness check for one agent. Resolves when the agent is reachable;
 * rejects with the failure otherwise.
 */
export type HealthProbe = (agent: Agent, signal: AbortSignal) => Promise<void>;
