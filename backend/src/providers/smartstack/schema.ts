import { z } from 'zod';

/**
 * One row of the HAProxy CSV stats page, keyed by header column.
 * Only the columns the status report reads are checked.
 */
export const haproxyStatsRowSchema = z.object({
  pxname: z.string(),
  svname: z.string(),
  status: z.string(),
  check_status: z.string().default(''),
  check_code: z.string().default(''),
  check_duration: z.string().default(''),
  lastchg: z.string().default(''),
  weight: z.string().default(''),
});

export type HaproxyStatsRow = z.infer<typeof haproxyStatsRowSchema>;
