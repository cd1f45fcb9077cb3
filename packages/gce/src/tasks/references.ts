/**
 * Sibling resources an instance refers to. Only their names and whatever
 * they publish to the registry are used here.
 */

import { ref } from "@tidewater/core";
import type { RegistryRecord, ResourceRef, ResourceRegistry } from "@tidewater/core";
import { literalProperty } from "@tidewater/terraform";
import { GoogleCloudURL } from "../utils/urls";

export type NetworkRecord = RegistryRecord;

export type SubnetRecord = RegistryRecord;

export interface IPAddressRecord extends RegistryRecord {
  /** Reserved literal address, once the address exists */
  readonly address?: string;
}

export interface PersistentDiskRecord extends RegistryRecord {
  readonly zone?: string;
}

export interface GceRecords {
  Network: NetworkRecord;
  Subnet: SubnetRecord;
  IPAddress: IPAddressRecord;
  PersistentDisk: PersistentDiskRecord;
}

export type GceRegistry = ResourceRegistry<GceRecords>;

export type NetworkRef = ResourceRef<"Network">;
export type SubnetRef = ResourceRef<"Subnet">;
export type IPAddressRef = ResourceRef<"IPAddress">;
export type PersistentDiskRef = ResourceRef<"PersistentDisk">;

export const networkRef = (name: string): NetworkRef => ref("Network", name);
export const subnetRef = (name: string): SubnetRef => ref("Subnet", name);
export const ipAddressRef = (name: string): IPAddressRef => ref("IPAddress", name);
export const persistentDiskRef = (name: string): PersistentDiskRef => ref("PersistentDisk", name);

export function networkURL(project: string, name: string): string {
  return new GoogleCloudURL(project, "networks", name, "global").toString();
}

export function diskURL(project: string, zone: string, name: string): string {
  return new GoogleCloudURL(project, "disks", name, { zone }).toString();
}

// ── Terraform expressions ──────────────────────────────────────────────

export function terraformNetworkName(network: NetworkRef): string {
  return literalProperty("google_compute_network", network.name, "name");
}

export function terraformSubnetName(subnet: SubnetRef): string {
  return literalProperty("google_compute_subnetwork", subnet.name, "name");
}

export function terraformAddress(ip: IPAddressRef): string {
  return literalProperty("google_compute_address", ip.name, "address");
}
