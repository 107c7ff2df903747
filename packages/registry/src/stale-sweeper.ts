import { createConsoleLogger, type Logger } from "@relaykit/a2a";
import { getErrorMessage } from "@relaykit/errors";
import type { AgentRegistry } from "./agent-registry.js";
import {
  type Clock,
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_STALE_THRESHOLD_MS,
  type StaleEvictionEvent,
  systemClock,
} from "./types.js";
import { createEmitter, type Emitter, type Handler } from "./utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StaleSweeperConfig {
  /** Sweep interval in ms */
  readonly intervalMs?: number | undefined;
  /** Silence after which an agent is evicted, in ms */
  readonly staleThresholdMs?: number | undefined;
}

export interface StaleSweeperOptions {
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

// ---------------------------------------------------------------------------
// StaleAgentSweeper
// ---------------------------------------------------------------------------

/**
 * Periodic stale-agent eviction.
 *
 * One interval scans the registry; every agent whose `lastSeen` is older
 * than the threshold is removed, logged at warn level and reported to
 * `onEvicted` handlers.
 */
export class StaleAgentSweeper {
  private timer: ReturnType<typeof setInterval> | undefined;
  private abortCleanup: (() => void) | undefined;
  private readonly events: Emitter<StaleEvictionEvent>;
  private readonly registry: AgentRegistry;
  private readonly intervalMs: number;
  private readonly staleThresholdMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    registry: AgentRegistry,
    config?: StaleSweeperConfig,
    options?: StaleSweeperOptions,
  ) {
    this.registry = registry;
    this.intervalMs = config?.intervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.staleThresholdMs = config?.staleThresholdMs ?? DEFAULT_STALE_THRESHOLD_MS;
    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? createConsoleLogger("registry:sweeper");
    this.events = createEmitter((error) => {
      this.logger.error(`Eviction handler failed: ${getErrorMessage(error)}`);
    });
  }

  /**
   * Start sweeping. Idempotent. Aborting `signal` stops the sweeper; an
   * already-aborted signal leaves it stopped.
   */
  start(signal?: AbortSignal): void {
    if (this.timer !== undefined || signal?.aborted) return;

    this.timer = setInterval(() => this.sweep(), this.intervalMs);

    if (signal !== undefined) {
      const onAbort = () => this.stop();
      signal.addEventListener("abort", onAbort, { once: true });
      this.abortCleanup = () => signal.removeEventListener("abort", onAbort);
    }
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.abortCleanup?.();
    this.abortCleanup = undefined;
  }

  /**
   * Subscribe to evictions. Returns a disposer.
   */
  onEvicted(handler: Handler<StaleEvictionEvent>): () => void {
    return this.events.on(handler);
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /** Run one sweep now. Returns the events it emitted. */
  sweep(): readonly StaleEvictionEvent[] {
    const evictedAt = this.clock.now();
    const evicted = this.registry.evictStale(this.staleThresholdMs);

    return evicted.map((agent) => {
      const event: StaleEvictionEvent = {
        agent,
        evictedAt,
        silentForMs: evictedAt - agent.lastSeen,
      };
      this.logger.warn(
        `Removing stale agent ${agent.id} (${agent.name}), silent for ${event.silentForMs}ms`,
      );
      this.events.emit(event);
      return event;
    });
  }
}
