import { z } from "zod";

/**
 * Configuration for the Compute Engine cloud handle.
 */
export const GceCloudConfigSchema = z
  .object({
    /** GCP project ID */
    project: z.string().min(1),
    /** GCE zone (e.g., "us-central1-a") */
    zone: z.string().min(1),
    /** GCE region; derived from the zone when omitted */
    region: z.string().min(1).optional(),
    /** Path to service account key file (optional, uses ADC if not provided) */
    keyFilePath: z.string().min(1).optional(),
    /** Fixed delay between operation status polls */
    pollIntervalMs: z.number().int().nonnegative().default(1_000),
  })
  .transform((config) => ({
    ...config,
    region: config.region ?? regionFromZone(config.zone),
  }));

export type GceCloudConfig = z.output<typeof GceCloudConfigSchema>;
export type GceCloudConfigInput = z.input<typeof GceCloudConfigSchema>;

/**
 * Extract region from zone (e.g., "us-central1-a" -> "us-central1")
 */
export function regionFromZone(zone: string): string {
  const parts = zone.split("-");
  return parts.slice(0, -1).join("-");
}

export function parseGceCloudConfig(input: unknown): GceCloudConfig {
  return GceCloudConfigSchema.parse(input);
}
