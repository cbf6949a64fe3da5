import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();
const urlPath = z.string().regex(/^\/[^?#]*$/, "must be an absolute path without query or fragment");

export const gatewayConfigSchema = z.object({
  port,
  host: z.string().min(1).optional(),

  // Session data plane
  bufferCapacity: z.number().int().min(1).optional(),
  heartbeatIntervalMs: positiveMs.optional(),
  backendIdleTimeoutMs: z.number().int().min(0).optional(),

  // Backend connector
  backendCallTimeoutMs: positiveMs.optional(),
  backendConnectTimeoutMs: positiveMs.optional(),
  backend: z
    .object({
      streamPath: urlPath,
      streamQuery: z.record(z.string()),
      callPathPrefix: z.union([urlPath, z.literal("")]),
    })
    .partial()
    .optional(),

  // HTTP surface
  maxBodyBytes: z.number().int().min(1).optional(),
});

/** Body of POST /control/register. `base_url` must be an absolute http(s) URL. */
export const registerRequestSchema = z.object({
  name: z.string().trim().min(1).max(200),
  base_url: z
    .string()
    .url()
    .refine((v) => /^https?:/i.test(v), "must be an http or https URL"),
  meta: z.record(z.unknown()).optional(),
});

export const unregisterRequestSchema = z.object({
  name: z.string().min(1),
});

export const connectRequestSchema = z.object({
  server: z.string().min(1),
});

export type RegisterRequest = z.infer<typeof registerRequestSchema>;
export type ConnectRequest = z.infer<typeof connectRequestSchema>;
