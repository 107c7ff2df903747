/**
 * HealthChecker: periodic liveness probes for every registered agent.
 *
 * Uses recursive setTimeout so a slow round never overlaps the next one.
 * Probe outcomes reach the registry only through `updateStatus`:
 * - success refreshes the agent to `online` (and its `lastSeen`)
 * - transport failures, exhausted discovery and probe timeouts mean `offline`
 * - anything else means `error`
 * Failures only write when the status changes, so an agent that stays
 * unreachable keeps its old `lastSeen` and is eventually swept as stale.
 */

import type { A2AClient, Agent, AgentCardDiscoverer, AgentStatus, Logger } from "@relaykit/a2a";
import { createConsoleLogger } from "@relaykit/a2a";
import {
  A2aCancelledError,
  A2aDiscoveryFailedError,
  A2aTransportError,
  getErrorMessage,
  RegistryAgentNotFoundError,
} from "@relaykit/errors";
import type { AgentRegistry } from "./agent-registry.js";
import {
  DEFAULT_HEALTH_CHECK_INTERVAL_MS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  type HealthProbe,
  type StatusChangeEvent,
} from "./types.js";
import { createEmitter, type Emitter, type Handler } from "./utils/emitter.js";

export interface HealthCheckerConfig {
  readonly intervalMs?: number | undefined;
  readonly timeoutMs?: number | undefined;
}

export interface HealthCheckerOptions {
  readonly logger?: Logger | undefined;
}

/** Map a probe failure to the status it implies */
export function statusForFailure(error: unknown): AgentStatus {
  if (error instanceof A2aTransportError || error instanceof A2aDiscoveryFailedError) {
    return "offline";
  }
  return "error";
}

// ---------------------------------------------------------------------------
// Probes
// ---------------------------------------------------------------------------

/** Probe that re-fetches the agent's card */
export function createCardProbe(discoverer: AgentCardDiscoverer): HealthProbe {
  return async (agent, signal) => {
    await discoverer.discover(agent.url, signal);
  };
}

/** Probe that only checks the well-known card path answers */
export function createPingProbe(client: A2AClient): HealthProbe {
  return (agent, signal) => client.ping(agent.url, { signal });
}

// ---------------------------------------------------------------------------
// HealthChecker
// ---------------------------------------------------------------------------

export class HealthChecker {
  private readonly registry: AgentRegistry;
  private readonly probe: HealthProbe;
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly events: Emitter<StatusChangeEvent>;

  private running = false;
  private timerId: ReturnType<typeof setTimeout> | undefined;
  private round: Promise<void> | undefined;
  private roundController: AbortController | undefined;
  private abortCleanup: (() => void) | undefined;

  constructor(
    registry: AgentRegistry,
    probe: HealthProbe,
    config?: HealthCheckerConfig,
    options?: HealthCheckerOptions,
  ) {
    this.registry = registry;
    this.probe = probe;
    this.intervalMs = config?.intervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_HEALTH_CHECK_TIMEOUT_MS;
    this.logger = options?.logger ?? createConsoleLogger("registry:health");
    this.events = createEmitter((error) => {
      this.logger.error(`Status change handler failed: ${getErrorMessage(error)}`);
    });
  }

  /**
   * Start checking. Idempotent. Aborting `signal` has the same effect as
   * calling `stop()`.
   */
  start(signal?: AbortSignal): void {
    if (this.running || signal?.aborted) return;
    this.running = true;
    this.schedule();

    if (signal !== undefined) {
      const onAbort = () => {
        this.stop().catch((error: unknown) => {
          this.logger.error(`Health checker stopped with error: ${getErrorMessage(error)}`);
        });
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.abortCleanup = () => signal.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Stop checking. In-flight probes are aborted; resolves once the current
   * round has finished.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timerId !== undefined) {
      clearTimeout(this.timerId);
      this.timerId = undefined;
    }
    this.abortCleanup?.();
    this.abortCleanup = undefined;
    this.roundController?.abort();
    await this.round;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Subscribe to status changes. Returns a disposer. */
  onStatusChange(handler: Handler<StatusChangeEvent>): () => void {
    return this.events.on(handler);
  }

  /**
   * Probe every registered agent once, concurrently.
   * Safe to call while stopped.
   */
  checkAll(): Promise<void> {
    if (this.round !== undefined) return this.round;

    const controller = new AbortController();
    this.roundController = controller;
    const agents = this.registry.list();

    this.round = Promise.all(agents.map((agent) => this.checkOne(agent, controller.signal)))
      .then(() => undefined)
      .finally(() => {
        this.round = undefined;
        this.roundController = undefined;
      });
    return this.round;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private schedule(): void {
    this.timerId = setTimeout(() => {
      this.timerId = undefined;
      this.checkAll()
        .catch((error: unknown) => {
          this.logger.error(`Health check round failed: ${getErrorMessage(error)}`);
        })
        .finally(() => {
          if (this.running) this.schedule();
        });
    }, this.intervalMs);
  }

  private async checkOne(agent: Agent, roundSignal: AbortSignal): Promise<void> {
    let failure: unknown;
    try {
      await this.runProbe(agent, roundSignal);
    } catch (error) {
      failure = error;
    }

    if (roundSignal.aborted) return;

    const next: AgentStatus = failure === undefined ? "online" : statusForFailure(failure);
    if (failure !== undefined) {
      this.logger.debug(`Probe of ${agent.id} failed: ${getErrorMessage(failure)}`);
    }

    let previous: AgentStatus;
    try {
      previous = this.registry.get(agent.id).status;
      // a failing agent keeps its lastSeen until its status actually moves
      if (failure !== undefined && previous === next) return;
      this.registry.updateStatus(agent.id, next);
    } catch (error) {
      if (error instanceof RegistryAgentNotFoundError) {
        this.logger.debug(`Agent ${agent.id} was removed during its health check`);
        return;
      }
      throw error;
    }

    if (previous !== next) {
      this.logger.info(`Agent ${agent.id} is now ${next} (was ${previous})`);
      this.events.emit({
        agentId: agent.id,
        previous,
        current: next,
        ...(failure !== undefined ? { error: failure } : {}),
      });
    }
  }

  /** Run the probe under the per-probe deadline, linked to the round's signal */
  private runProbe(agent: Agent, roundSignal: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const onRoundAbort = () => controller.abort();
    roundSignal.addEventListener("abort", onRoundAbort, { once: true });

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new A2aTransportError(agent.url, `Health check timed out after ${this.timeoutMs}ms`, {
            timedOut: true,
          }),
        );
      }, this.timeoutMs);

      const settle = () => {
        clearTimeout(timer);
        roundSignal.removeEventListener("abort", onRoundAbort);
      };

      this.probe(agent, controller.signal).then(
        () => {
          settle();
          resolve();
        },
        (error: unknown) => {
          settle();
          reject(roundSignal.aborted ? new A2aCancelledError("health check", error) : error);
        },
      );
    });
  }
}
