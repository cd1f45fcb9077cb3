/**
 * `google_compute_instance` block, built from the same mapped payload the
 * live target submits.
 */

import type { protos } from "@google-cloud/compute";
import { lastComponent } from "../utils/urls";
import type { NetworkRef, SubnetRef } from "./references";
import { terraformNetworkName, terraformSubnetName } from "./references";

type GceInstance = protos.google.cloud.compute.v1.IInstance;
type GceAttachedDisk = protos.google.cloud.compute.v1.IAttachedDisk;

export const STARTUP_SCRIPT_KEY = "startup-script";

export interface TerraformAttachedDisk {
  auto_delete?: boolean;
  scratch?: boolean;
  device_name?: string;
  disk?: string;
  image?: string;
  type?: string;
  size?: number;
}

export interface TerraformAccessConfig {
  nat_ip?: string;
}

export interface TerraformNetworkInterface {
  network?: string;
  subnetwork?: string;
  access_config?: TerraformAccessConfig[];
}

export interface TerraformServiceAccount {
  scopes: string[];
}

export interface TerraformScheduling {
  automatic_restart: boolean;
  on_host_maintenance?: string;
  preemptible: boolean;
}

export interface TerraformInstanceTemplate {
  name: string;
  can_ip_forward: boolean;
  machine_type: string;
  zone: string;
  tags?: string[];
  disk?: TerraformAttachedDisk[];
  network_interface?: TerraformNetworkInterface[];
  service_account?: TerraformServiceAccount[];
  metadata?: Record<string, string>;
  metadata_startup_script?: string;
  scheduling?: TerraformScheduling;
}

export interface TerraformInstanceRefs {
  zone: string;
  network?: NetworkRef;
  subnet?: SubnetRef;
}

export function buildTerraformInstance(
  payload: GceInstance,
  refs: TerraformInstanceRefs
): TerraformInstanceTemplate {
  const tf: TerraformInstanceTemplate = {
    name: payload.name ?? "",
    can_ip_forward: payload.canIpForward ?? false,
    machine_type: lastComponent(payload.machineType ?? ""),
    // terraform requires a zone
    zone: payload.zone || refs.zone,
  };

  if (payload.tags?.items?.length) {
    tf.tags = [...payload.tags.items];
  }

  const disks = (payload.disks ?? []).map(terraformDisk);
  if (disks.length > 0) {
    tf.disk = disks;
  }

  const networkInterfaces = terraformNetworkInterfaces(payload, refs);
  if (networkInterfaces.length > 0) {
    tf.network_interface = networkInterfaces;
  }

  const serviceAccounts = (payload.serviceAccounts ?? []).map(
    (sa): TerraformServiceAccount => ({ scopes: [...(sa.scopes ?? [])] })
  );
  if (serviceAccounts.length > 0) {
    tf.service_account = serviceAccounts;
  }

  const metadata: Record<string, string> = {};
  for (const item of payload.metadata?.items ?? []) {
    if (item.key) metadata[item.key] = item.value ?? "";
  }
  const startupScript = metadata[STARTUP_SCRIPT_KEY];
  if (startupScript !== undefined) {
    delete metadata[STARTUP_SCRIPT_KEY];
    tf.metadata_startup_script = startupScript;
  }
  if (Object.keys(metadata).length > 0) {
    tf.metadata = metadata;
  }

  if (payload.scheduling) {
    tf.scheduling = {
      automatic_restart: payload.scheduling.automaticRestart ?? false,
      on_host_maintenance: payload.scheduling.onHostMaintenance ?? undefined,
      preemptible: payload.scheduling.preemptible ?? false,
    };
  }

  return tf;
}

function terraformDisk(d: GceAttachedDisk): TerraformAttachedDisk {
  const tfd: TerraformAttachedDisk = {
    device_name: d.deviceName ?? undefined,
  };
  if (d.autoDelete) tfd.auto_delete = true;
  if (String(d.type) === "SCRATCH") tfd.scratch = true;

  const params = d.initializeParams;
  if (params) {
    tfd.disk = params.diskName || undefined;
    tfd.image = params.sourceImage || undefined;
    tfd.type = params.diskType || undefined;
    tfd.size = params.diskSizeGb == null ? undefined : Number(params.diskSizeGb);
  } else if (d.source) {
    tfd.disk = lastComponent(d.source);
  }
  return tfd;
}

function terraformNetworkInterfaces(
  payload: GceInstance,
  refs: TerraformInstanceRefs
): TerraformNetworkInterface[] {
  return (payload.networkInterfaces ?? []).map((ni) => {
    const tfni: TerraformNetworkInterface = {};
    if (refs.network) tfni.network = terraformNetworkName(refs.network);
    if (refs.subnet) tfni.subnetwork = terraformSubnetName(refs.subnet);

    const accessConfigs = (ni.accessConfigs ?? []).map(
      (ac): TerraformAccessConfig => ({ nat_ip: ac.natIP ?? undefined })
    );
    if (accessConfigs.length > 0) tfni.access_config = accessConfigs;
    return tfni;
  });
}
