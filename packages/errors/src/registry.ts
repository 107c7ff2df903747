/**
 * Registry errors: in-memory agent registry
 *
 * Abstract base: RegistryError
 * Concrete:
 *   - RegistryAgentNotFoundError (REGISTRY_AGENT_NOT_FOUND)
 *   - RegistryAgentInvalidError  (REGISTRY_AGENT_INVALID)
 *   - RegistryFullError          (REGISTRY_FULL)
 */

import { RelayError } from "./base.js";

export abstract class RegistryError extends RelayError {}

export class RegistryAgentNotFoundError extends RegistryError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "REGISTRY_AGENT_NOT_FOUND" as const;
  readonly agentId: string;

  constructor(agentId: string) {
    super(`Agent not found: ${agentId}`);
    this.agentId = agentId;
  }
}

export class RegistryAgentInvalidError extends RegistryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "REGISTRY_AGENT_INVALID" as const;

  constructor(reason: string) {
    super(`Invalid agent record: ${reason}`);
  }
}

export class RegistryFullError extends RegistryError {
  readonly _tag = "RateLimitError" as const;
  readonly code = "REGISTRY_FULL" as const;
  readonly maxAgents: number;

  constructor(maxAgents: number) {
    super(`Registry is full (max ${maxAgents} agents)`);
    this.maxAgents = maxAgents;
  }
}
