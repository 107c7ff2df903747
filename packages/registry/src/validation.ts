import { z } from "zod";

export const RegistryConfigSchema = z.object({
  maxAgents: z.number().int().min(1).max(100_000).optional(),
  cleanupIntervalMs: z.number().int().min(100).max(86_400_000).optional(),
  staleThresholdMs: z.number().int().min(1_000).max(604_800_000).optional(),
  healthCheckIntervalMs: z.number().int().min(100).max(86_400_000).optional(),
  healthCheckTimeoutMs: z.number().int().min(100).max(600_000).optional(),
});
