import { z } from "zod";

const Ipv4Schema = z.string().regex(/^(?:\d{1,3}\.){3}\d{1,3}$/, "expected a dotted IPv4 address");

const DiscoverySchema = z
  .object({
    interface: Ipv4Schema.optional(),
    timeoutMs: z.number().int().min(100).max(60_000).optional(),
  })
  .strict()
  .optional();

const RegistrySchema = z
  .object({
    missingThresholdHours: z.number().positive().optional(),
  })
  .strict()
  .optional();

export const EasyIpConfigSchema = z
  .object({
    discovery: DiscoverySchema,
    registry: RegistrySchema,
  })
  .strict();
