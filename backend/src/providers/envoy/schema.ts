import { z } from 'zod';

/**
 * Envoy admin `/clusters?format=json` response
 */
export const envoyHostStatusSchema = z.object({
  address: z.object({
    socket_address: z.object({
      address: z.string(),
      port_value: z.number().int(),
    }),
  }),
  health_status: z
    .object({
      eds_health_status: z.string().default('UNKNOWN'),
    })
    .default({}),
  weight: z.number().optional(),
  hostname: z.string().optional(),
});

export const envoyClustersSchema = z.object({
  cluster_statuses: z
    .array(
      z.object({
        name: z.string(),
        host_statuses: z.array(envoyHostStatusSchema).default([]),
      })
    )
    .default([]),
});

export type EnvoyHostStatus = z.infer<typeof envoyHostStatusSchema>;
