/**
 * @relaykit/registry: in-memory registry of discovered A2A agents
 *
 * Copy-on-write agent store with capability search, a periodic stale-agent
 * sweeper and an optional health checker.
 */

export { AgentRegistry, type AgentRegistryOptions } from "./agent-registry.js";
export { type CreateAgentOptions, createAgent, deriveAgentId, discoverAndRegister } from "./agent.js";
export { type CreateRegistryOptions, createRegistry, type RegistryRuntime } from "./create-registry.js";
export {
  createCardProbe,
  createPingProbe,
  HealthChecker,
  type HealthCheckerConfig,
  type HealthCheckerOptions,
  statusForFailure,
} from "./health-checker.js";
export {
  StaleAgentSweeper,
  type StaleSweeperConfig,
  type StaleSweeperOptions,
} from "./stale-sweeper.js";
export type {
  Clock,
  HealthProbe,
  RegistryConfig,
  StaleEvictionEvent,
  StatusChangeEvent,
} from "./types.js";
export {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_HEALTH_CHECK_INTERVAL_MS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  DEFAULT_MAX_AGENTS,
  DEFAULT_STALE_THRESHOLD_MS,
  systemClock,
} from "./types.js";
export { RegistryConfigSchema } from "./validation.js";
