import { z } from "zod";

// ── Standing ─────────────────────────────────────────────────────────

const endpointKey = z.string().min(1).max(500);

export const StandingQuerySchema = z.object({
  endpoint: endpointKey,
});

export const CallerTargetBodySchema = z.object({
  endpoint: endpointKey,
  uniqueId: z.string().min(1).max(500),
  group: z.string().min(1).max(100),
});
export type CallerTargetBody = z.infer<typeof CallerTargetBodySchema>;
