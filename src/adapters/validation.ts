import { z } from "zod";

/**
 * Configuration schema. Every key has a default, so an empty YAML document
 * (or no file at all) yields the stock OpenClash layout.
 */

const positiveMs = z.number().int().positive();

export const ApiConfigSchema = z.object({
  url: z.string().url().default("http://127.0.0.1:9090/logs?level=debug"),
  probeTimeoutMs: positiveMs.default(5000),
  pollTimeoutMs: positiveMs.default(2000),
});

export const ServiceConfigSchema = z.object({
  restartCommand: z
    .array(z.string().min(1))
    .min(1, "restartCommand needs at least the executable")
    .default(["/etc/init.d/openclash", "restart"]),
  settleMs: z.number().int().min(0).default(5000),
  readyTimeoutMs: positiveMs.default(30000),
  pollIntervalMs: positiveMs.default(1000),
});

export const CaptureConfigSchema = z.object({
  durationMs: positiveMs.default(20000),
  debugMarker: z.string().min(1).default('"type":"debug"'),
});

export const PathsConfigSchema = z.object({
  scratchDir: z.string().min(1).default("/tmp"),
  fullApiLog: z.string().min(1).default("/tmp/openclash_full_api.log"),
  debugApiLog: z.string().min(1).default("/tmp/openclash_debug_api.log"),
  systemDebugLog: z.string().min(1).default("/tmp/openclash_debug.log"),
  archiveDir: z.string().min(1).default("/tmp"),
  archivePrefix: z
    .string()
    .regex(/^[A-Za-z0-9._-]+$/, "archivePrefix must be a plain file name")
    .default("openclash_debug_package"),
});

export const VendorConfigSchema = z.object({
  debugScript: z
    .string()
    .min(1)
    .default("/usr/share/openclash/openclash_debug.sh"),
});

export const LoggingConfigSchema = z.object({
  jsonLogPath: z.string().default(""),
});

export const ConfigSchema = z.object({
  api: ApiConfigSchema.default({}),
  service: ServiceConfigSchema.default({}),
  capture: CaptureConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
  vendor: VendorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join(", ");
}
