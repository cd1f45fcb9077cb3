import { z } from "zod";
import { FileResource, StringResource } from "@tidewater/core";
import type { Resource } from "@tidewater/core";
import { Instance } from "./instance";
import { ipAddressRef, networkRef, persistentDiskRef, subnetRef } from "./references";

const ResourceNameSchema = z
  .string()
  .regex(/^[a-z]([-a-z0-9]*[a-z0-9])?$/, "must be a lowercase RFC 1035 name")
  .max(63);

/**
 * Metadata values are either literal strings or `{ file }` sources read when
 * the instance is mapped.
 */
const MetadataValueSchema = z.union([z.string(), z.object({ file: z.string().min(1) }).strict()]);

export const InstanceSpecSchema = z
  .object({
    name: ResourceNameSchema,
    zone: z.string().min(1),
    machineType: z.string().min(1).optional(),
    image: z.string().min(1).optional(),
    preemptible: z.boolean().optional(),
    canIpForward: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
    scopes: z.array(z.string()).optional(),
    metadata: z.record(MetadataValueSchema).optional(),
    network: z.string().min(1).optional(),
    subnet: z.string().min(1).optional(),
    ipAddress: z.string().min(1).optional(),
    /** Attached disk names keyed by device name */
    disks: z.record(z.string().min(1)).optional(),
  })
  .strict()
  .refine((spec) => !spec.ipAddress || spec.network, {
    message: "ipAddress requires a network",
    path: ["ipAddress"],
  });

export type InstanceSpec = z.infer<typeof InstanceSpecSchema>;

export function parseInstanceSpec(input: unknown): Instance {
  const spec = InstanceSpecSchema.parse(input);

  let metadata: Record<string, Resource> | undefined;
  if (spec.metadata) {
    metadata = {};
    for (const [key, value] of Object.entries(spec.metadata)) {
      metadata[key] = typeof value === "string" ? new StringResource(value) : new FileResource(value.file);
    }
  }

  let disks: Instance["disks"];
  if (spec.disks) {
    disks = {};
    for (const [deviceName, diskName] of Object.entries(spec.disks)) {
      disks[deviceName] = persistentDiskRef(diskName);
    }
  }

  return new Instance({
    name: spec.name,
    zone: spec.zone,
    machineType: spec.machineType,
    image: spec.image,
    preemptible: spec.preemptible,
    canIpForward: spec.canIpForward,
    tags: spec.tags,
    scopes: spec.scopes,
    metadata,
    network: spec.network ? networkRef(spec.network) : undefined,
    subnet: spec.subnet ? subnetRef(spec.subnet) : undefined,
    ipAddress: spec.ipAddress ? ipAddressRef(spec.ipAddress) : undefined,
    disks,
  });
}
