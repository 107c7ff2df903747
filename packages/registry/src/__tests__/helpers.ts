/**
 * Test helpers for @relaykit/registry
 */

import type { Agent, AgentCard, Logger } from "@relaykit/a2a";
import { vi } from "vitest";
import type { Clock } from "../types.js";

export function createTestCard(overrides?: Partial<AgentCard>): AgentCard {
  return {
    name: "Test Agent",
    version: "1.0.0",
    capabilities: { streaming: true, pushNotifications: false },
    endpoints: [
      { type: "a2a", url: "https://agent.example.com/a2a", methods: ["tasks/send"] },
    ],
    ...overrides,
  };
}

export function createTestAgent(overrides?: Partial<Agent>): Agent {
  return {
    id: "agent-1",
    name: "Test Agent",
    url: "https://agent.example.com",
    card: createTestCard(),
    status: "online",
    discoveredAt: 1_000,
    lastSeen: 1_000,
    ...overrides,
  };
}

export interface ManualClock extends Clock {
  set(ms: number): void;
  advance(ms: number): void;
}

export function createManualClock(start = 1_000): ManualClock {
  let current = start;
  return {
    now: () => current,
    set(ms) {
      current = ms;
    },
    advance(ms) {
      current += ms;
    },
  };
}

export function createMockLogger(): Logger & {
  readonly debug: ReturnType<typeof vi.fn>;
  readonly info: ReturnType<typeof vi.fn>;
  readonly warn: ReturnType<typeof vi.fn>;
  readonly error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
