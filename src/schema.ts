import { z } from 'zod';

const scalar = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const recordTypeSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(
    z.enum([
      'A',
      'AAAA',
      'CAA',
      'CNAME',
      'MX',
      'NS',
      'PTR',
      'SOA',
      'SPF',
      'SRV',
      'TXT',
      'TUNNEL',
    ])
  );

export const providerSchema = z.enum(['route53', 'cloudflare']);

export const routingPolicySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('weighted'),
    weight: z.number().int().min(0).max(255),
  }),
  z.object({ type: z.literal('latency'), region: z.string().min(1) }),
  z.object({
    type: z.literal('geolocation'),
    continent: z.string().optional(),
    country: z.string().optional(),
    subdivision: z.string().optional(),
  }),
  z.object({
    type: z.literal('failover'),
    role: z
      .string()
      .transform((value) => value.toUpperCase())
      .pipe(z.enum(['PRIMARY', 'SECONDARY'])),
  }),
  z.object({ type: z.literal('multivalue') }),
]);

export const rawRecordSchema = z.object({
  name: z.string().min(1),
  type: recordTypeSchema,
  ttl: z.number().int().nonnegative().optional(),
  values: z.array(scalar).optional(),
  mx_records: z
    .array(
      z.object({
        priority: z.number().int().nonnegative(),
        value: z.string().min(1),
      })
    )
    .optional(),
  set_identifier: z.string().min(1).optional(),
  routing_policy: routingPolicySchema.optional(),
  proxied: z.boolean().optional(),
  tunnel: z
    .object({ name: z.string().min(1), service: z.string().min(1) })
    .optional(),
});

const tunnelMapSchema = z.record(
  z.string(),
  z.object({ tunnel_id: z.string().min(1) })
);

export const zoneDocumentSchema = z.object({
  zone_name: z.string().min(1),
  provider: providerSchema.optional(),
  providers: z.array(providerSchema).min(1).optional(),
  tunnels: tunnelMapSchema.optional(),
  records: z.array(rawRecordSchema),
});

export const tunnelRegistrySchema = z.object({
  tunnels: tunnelMapSchema.default({}),
});

export type ZoneDocument = z.infer<typeof zoneDocumentSchema>;
export type RawRecordDocument = z.infer<typeof rawRecordSchema>;
export type TunnelRegistryDocument = z.infer<typeof tunnelRegistrySchema>;

/** Render a zod issue path the way it reads in YAML: `records[2].ttl` */
export function formatIssuePath(path: (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}
