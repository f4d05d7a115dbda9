import { z } from 'zod';

/**
 * Runtime shapes of XenAPI XML-RPC replies.
 * Objects are not strict: the host sends far more fields than listed here.
 */

export const XenResponseSchema = z.discriminatedUnion('Status', [
  z.object({ Status: z.literal('Success'), Value: z.unknown() }),
  z.object({ Status: z.literal('Failure'), ErrorDescription: z.array(z.coerce.string()).default([]) }),
]);

export const SessionRefSchema = z.string().min(1);

export const VMRecordSchema = z.object({
  uuid: z.string().default(''),
  name_label: z.string(),
  power_state: z.string().default('Unknown'),
  is_control_domain: z.boolean(),
  is_a_template: z.boolean(),
  VIFs: z.array(z.string()).default([]),
  guest_metrics: z.string().default('OpaqueRef:NULL'),
});

export const VMRefListSchema = z.array(z.string());

export const VIFRecordSchema = z.object({
  network: z.string(),
});

export const NetworkRecordSchema = z.object({
  name_label: z.string(),
});

export const GuestMetricsRecordSchema = z.object({
  networks: z.record(z.string(), z.coerce.string()).default({}),
});

export type XenResponse = z.infer<typeof XenResponseSchema>;
