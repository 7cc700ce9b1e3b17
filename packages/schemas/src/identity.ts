import { z } from "zod";

export const CallerIdentitySchema = z.object({
  uniqueId: z.string().min(1),
  group: z.string().min(1),
});
export type CallerIdentity = z.infer<typeof CallerIdentitySchema>;
