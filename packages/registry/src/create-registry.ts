import type { Logger } from "@relaykit/a2a";
import { AgentRegistry } from "./agent-registry.js";
import { HealthChecker } from "./health-checker.js";
import { StaleAgentSweeper } from "./stale-sweeper.js";
import type { Clock, HealthProbe, RegistryConfig } from "./types.js";
import { RegistryConfigSchema } from "./validation.js";

export interface CreateRegistryOptions {
  /** Enables periodic health checks when given */
  readonly probe?: HealthProbe | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * A registry wired to its background workers.
 */
export interface RegistryRuntime {
  readonly registry: AgentRegistry;
  readonly sweeper: StaleAgentSweeper;
  readonly healthChecker: HealthChecker | undefined;
  /** Start the sweeper and, when configured, the health checker */
  start(signal?: AbortSignal): void;
  stop(): Promise<void>;
}

/**
 * Validate a registry config and build the registry with its sweeper and
 * optional health checker.
 */
export function createRegistry(
  config?: RegistryConfig,
  options?: CreateRegistryOptions,
): RegistryRuntime {
  const parsed = RegistryConfigSchema.parse(config ?? {});
  const shared = { clock: options?.clock, logger: options?.logger };

  const registry = new AgentRegistry({ maxAgents: parsed.maxAgents, ...shared });
  const sweeper = new StaleAgentSweeper(
    registry,
    { intervalMs: parsed.cleanupIntervalMs, staleThresholdMs: parsed.staleThresholdMs },
    shared,
  );
  const healthChecker =
    options?.probe !== undefined
      ? new HealthChecker(
          registry,
          options.probe,
          { intervalMs: parsed.healthCheckIntervalMs, timeoutMs: parsed.healthCheckTimeoutMs },
          { logger: options.logger },
        )
      : undefined;

  return {
    registry,
    sweeper,
    healthChecker,
    start(signal) {
      sweeper.start(signal);
      healthChecker?.start(signal);
    },
    async stop() {
      sweeper.stop();
      await healthChecker?.stop();
    },
  };
}
