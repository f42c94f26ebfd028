import { z } from 'zod';

export const statsResponseSchema = z.object({
  type: z.string(),
  count: z.number().int().nonnegative(),
  sum: z.number(),
});

export type StatsResponse = z.infer<typeof statsResponseSchema>;

export type AllStatsResponse = Record<string, StatsResponse>;
