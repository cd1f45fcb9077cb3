/**
 * Instance Task
 *
 * Desired or actual shape of one Compute Engine VM. `find` reads the live
 * instance back into this shape, and `render` applies the difference either
 * through the SDK (only metadata can be changed in place) or as a terraform
 * `google_compute_instance` block.
 */

import { Logger } from "@nestjs/common";
import type { protos } from "@google-cloud/compute";
import {
  ReconcileError,
  ReconcileErrorType,
  StringResource,
  backendError,
  buildChanges,
  changedFields,
  equalRefMaps,
  equalRefs,
  equalResourceMaps,
  equalSets,
  equalLists,
  equalValues,
  isZero,
  resourceAsString,
  isReconcileError,
} from "@tidewater/core";
import type { Changes, DeltaTask, FieldComparators, Resource } from "@tidewater/core";
import type { TerraformTarget } from "@tidewater/terraform";
import type { GceContext } from "../context";
import type { GceApiTarget } from "../gce-api-target";
import { isNotFoundError } from "../utils/errors";
import { expandScopeAlias, shortenScope } from "../utils/scopes";
import {
  buildImageURL,
  buildMachineTypeURL,
  lastComponent,
  parseGoogleCloudURL,
  shortenImageURL,
} from "../utils/urls";
import { buildTerraformInstance } from "./instance-terraform";
import type {
  GceRegistry,
  IPAddressRef,
  NetworkRef,
  PersistentDiskRef,
  SubnetRef,
} from "./references";
import {
  diskURL,
  ipAddressRef,
  networkRef,
  networkURL,
  persistentDiskRef,
  subnetRef,
  terraformAddress,
} from "./references";

type GceInstance = protos.google.cloud.compute.v1.IInstance;
type GceAttachedDisk = protos.google.cloud.compute.v1.IAttachedDisk;
type GceNetworkInterface = protos.google.cloud.compute.v1.INetworkInterface;

export const BOOT_DISK_DEVICE_NAME = "persistent-disks-0";

/**
 * Given an IP address reference, produce the value to place in the access
 * config: a literal address, or an expression the template tool resolves.
 * `undefined` means the address does not exist yet.
 */
export type AddressResolver = (ip: IPAddressRef) => string | undefined;

export interface InstanceFields {
  name?: string;
  zone?: string;
  machineType?: string;
  /** Image spec, either `name` (in the instance's project) or `project/name` */
  image?: string;
  preemptible?: boolean;
  canIpForward?: boolean;

  tags?: string[];
  /** Scope aliases or long-form scope URIs, in order */
  scopes?: string[];
  metadata?: Record<string, Resource>;

  network?: NetworkRef;
  subnet?: SubnetRef;
  ipAddress?: IPAddressRef;
  /** Attached disks by device name; the boot disk is derived from `image` */
  disks?: Record<string, PersistentDiskRef>;
}

const instanceComparators: FieldComparators<InstanceFields> = {
  name: equalValues,
  zone: equalValues,
  machineType: equalValues,
  image: equalValues,
  preemptible: equalValues,
  canIpForward: equalValues,
  tags: equalSets,
  scopes: (actual, desired) => equalLists(actual.map(expandScopeAlias), desired.map(expandScopeAlias)),
  metadata: equalResourceMaps,
  network: equalRefs,
  subnet: equalRefs,
  ipAddress: equalRefs,
  disks: equalRefMaps,
};

export class Instance implements InstanceFields, DeltaTask<Instance, GceContext> {
  readonly kind = "Instance";

  name?: string;
  zone?: string;
  machineType?: string;
  image?: string;
  preemptible?: boolean;
  canIpForward?: boolean;
  tags?: string[];
  scopes?: string[];
  metadata?: Record<string, Resource>;
  network?: NetworkRef;
  subnet?: SubnetRef;
  ipAddress?: IPAddressRef;
  disks?: Record<string, PersistentDiskRef>;

  /** Concurrency token from the read that produced this task; never desired state */
  private metadataFingerprint?: string;

  private readonly logger = new Logger(Instance.name);

  constructor(fields: InstanceFields = {}) {
    this.name = fields.name;
    this.zone = fields.zone;
    this.machineType = fields.machineType;
    this.image = fields.image;
    this.preemptible = fields.preemptible;
    this.canIpForward = fields.canIpForward;
    this.tags = fields.tags;
    this.scopes = fields.scopes;
    this.metadata = fields.metadata;
    this.network = fields.network;
    this.subnet = fields.subnet;
    this.ipAddress = fields.ipAddress;
    this.disks = fields.disks;
  }

  compareWithId(): string | undefined {
    return this.name;
  }

  // ── Find ─────────────────────────────────────────────────────────────

  async find(context: GceContext): Promise<Instance | undefined> {
    const { cloud } = context;
    const name = this.required("name", this.name);
    const zone = this.required("zone", this.zone);

    let r: GceInstance;
    try {
      [r] = await cloud.instances.get({ project: cloud.project, zone, instance: name });
    } catch (error: unknown) {
      if (isNotFoundError(error)) return undefined;
      throw backendError(`error fetching instance "${name}"`, error);
    }

    const actual = new Instance({
      name: r.name ?? undefined,
      tags: [...(r.tags?.items ?? [])],
      zone: r.zone ? lastComponent(r.zone) : undefined,
      machineType: r.machineType ? lastComponent(r.machineType) : undefined,
      canIpForward: r.canIpForward ?? false,
      scopes: (r.serviceAccounts ?? []).flatMap((sa) => (sa.scopes ?? []).map(shortenScope)),
    });

    if (r.scheduling) {
      actual.preemptible = r.scheduling.preemptible ?? false;
    }

    const [ni] = r.networkInterfaces ?? [];
    if (ni) {
      await actual.readNetworkInterface(context, ni);
    }

    actual.disks = {};
    for (const [index, disk] of (r.disks ?? []).entries()) {
      if (index === 0) {
        actual.image = await this.readBootImage(context, zone, disk);
      } else {
        const [deviceName, diskRef] = readAttachedDisk(disk);
        actual.disks[deviceName] = diskRef;
      }
    }

    if (r.metadata) {
      actual.metadata = {};
      for (const item of r.metadata.items ?? []) {
        if (!item.key) continue;
        if (item.value === null || item.value === undefined) {
          this.logger.warn(`ignoring instance metadata entry with nil value: "${item.key}"`);
          continue;
        }
        actual.metadata[item.key] = new StringResource(item.value);
      }
      actual.metadataFingerprint = r.metadata.fingerprint ?? undefined;
    }

    return actual;
  }

  private async readNetworkInterface(context: GceContext, ni: GceNetworkInterface): Promise<void> {
    if (ni.network) this.network = networkRef(lastComponent(ni.network));
    if (ni.subnetwork) this.subnet = subnetRef(lastComponent(ni.subnetwork));

    const natIP = ni.accessConfigs?.[0]?.natIP;
    if (!natIP) return;

    const { cloud } = context;
    let addresses: protos.google.cloud.compute.v1.IAddress[];
    try {
      [addresses] = await cloud.addresses.list({
        project: cloud.project,
        region: cloud.region,
        filter: `address = "${natIP}"`,
      });
    } catch (error: unknown) {
      throw backendError(`error querying for address "${natIP}"`, error);
    }

    const name = addresses[0]?.name;
    if (!name) {
      throw new ReconcileError(`address not found "${natIP}"`, ReconcileErrorType.BACKEND);
    }
    this.ipAddress = ipAddressRef(name);
  }

  /**
   * The boot disk is looked up in the instance's own project and zone.
   */
  private async readBootImage(
    context: GceContext,
    zone: string,
    disk: GceAttachedDisk
  ): Promise<string> {
    const { cloud } = context;
    const source = disk.source ?? "";

    let sourceImage: string | null | undefined;
    try {
      const [d] = await cloud.disks.get({ project: cloud.project, zone, disk: lastComponent(source) });
      sourceImage = d.sourceImage;
    } catch (error: unknown) {
      if (isNotFoundError(error)) {
        throw backendError(`disk not found "${source}"`, error);
      }
      throw backendError(`error querying for disk "${source}"`, error);
    }

    let image: string;
    try {
      image = shortenImageURL(cloud.project, sourceImage ?? "");
    } catch (error: unknown) {
      throw new ReconcileError(
        "error parsing source image URL",
        ReconcileErrorType.MALFORMED_IDENTIFIER,
        error
      );
    }

    // Read back in the desired spelling when both name the same image.
    if (this.image && buildImageURL(cloud.project, this.image) === buildImageURL(cloud.project, image)) {
      return this.image;
    }
    return image;
  }

  // ── Diff ─────────────────────────────────────────────────────────────

  buildChanges(actual: Instance | undefined): Promise<Changes<Instance>> {
    return buildChanges<InstanceFields>(actual, this, instanceComparators);
  }

  checkChanges(_a: Instance | undefined, _e: Instance, _changes: Changes<Instance>): void {
    // accepts any diff
  }

  // ── Mapping ──────────────────────────────────────────────────────────

  /**
   * Map desired state to a Compute Engine instance resource. The zone is
   * left out: calls and templates carry it separately.
   */
  async mapToGce(
    project: string,
    resolveAddress: AddressResolver,
    registry: GceRegistry
  ): Promise<GceInstance> {
    const name = this.required("name", this.name);
    const zone = this.required("zone", this.zone);
    const machineType = this.required("machineType", this.machineType);
    const image = this.required("image", this.image);

    const scheduling: protos.google.cloud.compute.v1.IScheduling = this.preemptible
      ? { automaticRestart: false, onHostMaintenance: "TERMINATE", preemptible: true }
      : { automaticRestart: true, onHostMaintenance: "MIGRATE", preemptible: false };

    const disks: GceAttachedDisk[] = [
      {
        initializeParams: { sourceImage: buildImageURL(project, image) },
        boot: true,
        deviceName: BOOT_DISK_DEVICE_NAME,
        index: 0,
        autoDelete: true,
        mode: "READ_WRITE",
        type: "PERSISTENT",
      },
    ];
    for (const deviceName of Object.keys(this.disks ?? {}).sort()) {
      const disk = this.disks?.[deviceName];
      if (!disk) continue;
      const diskZone = registry.lookup(disk)?.zone ?? zone;
      disks.push({
        source: diskURL(project, diskZone, disk.name),
        autoDelete: false,
        mode: "READ_WRITE",
        deviceName,
      });
    }

    const networkInterfaces: GceNetworkInterface[] = [];
    if (this.network) {
      const networkInterface: GceNetworkInterface = {
        network: networkURL(project, this.network.name),
      };
      if (this.subnet) {
        networkInterface.subnetwork = this.subnet.name;
      }
      if (this.ipAddress) {
        const natIP = resolveAddress(this.ipAddress);
        if (natIP === undefined) {
          throw new ReconcileError(
            `IP address "${this.ipAddress.name}" for instance "${name}" has not yet been created`,
            ReconcileErrorType.DEPENDENCY_NOT_READY
          );
        }
        networkInterface.accessConfigs = [{ natIP, type: "ONE_TO_ONE_NAT" }];
      }
      networkInterfaces.push(networkInterface);
    } else if (this.ipAddress) {
      throw new ReconcileError(
        `instance "${name}" has an IP address but no network`,
        ReconcileErrorType.INVALID_SPEC
      );
    }

    const serviceAccounts: protos.google.cloud.compute.v1.IServiceAccount[] = this.scopes
      ? [{ email: "default", scopes: this.scopes.map(expandScopeAlias) }]
      : [];

    const metadataItems: protos.google.cloud.compute.v1.IItems[] = [];
    for (const key of Object.keys(this.metadata ?? {}).sort()) {
      const resource = this.metadata?.[key];
      if (!resource) continue;
      try {
        metadataItems.push({ key, value: await resourceAsString(resource) });
      } catch (error: unknown) {
        throw new ReconcileError(
          `error rendering instance metadata "${key}"`,
          ReconcileErrorType.INVALID_SPEC,
          error
        );
      }
    }

    return {
      name,
      canIpForward: this.canIpForward ?? false,
      disks,
      machineType: buildMachineTypeURL(project, zone, machineType),
      metadata: { items: metadataItems },
      networkInterfaces,
      scheduling,
      serviceAccounts,
      tags: this.tags ? { items: [...this.tags] } : undefined,
    };
  }

  // ── Render ───────────────────────────────────────────────────────────

  render(
    context: GceContext,
    actual: Instance | undefined,
    desired: Instance,
    changes: Changes<Instance>
  ): Promise<void> {
    const { target, registry } = context;
    switch (target.kind) {
      case "gce":
        return desired.renderGce(target, registry, actual, changes);
      case "terraform":
        return desired.renderTerraform(target, registry);
      default: {
        const unhandled: never = target;
        throw new Error(`unsupported render target: ${String(unhandled)}`);
      }
    }
  }

  async renderGce(
    target: GceApiTarget,
    registry: GceRegistry,
    actual: Instance | undefined,
    changes: Changes<Instance>
  ): Promise<void> {
    const { cloud } = target;
    const project = cloud.project;
    const zone = this.required("zone", this.zone);

    const payload = await this.mapToGce(project, (ip) => registry.lookup(ip)?.address, registry);
    const name = payload.name ?? "";

    if (!actual) {
      this.logger.log(`Creating instance "${name}"`);
      try {
        await cloud.instances.insert({ project, zone, instanceResource: payload });
      } catch (error: unknown) {
        throw backendError(`error creating instance "${name}"`, error);
      }
      return;
    }

    // Only metadata has an in-place update path; nothing is applied if any
    // other field differs.
    const unsupported = changedFields(changes).filter((field) => field !== "metadata");
    if (unsupported.length > 0) {
      throw this.unsupportedChange(name, unsupported);
    }

    if (changes.metadata !== undefined) {
      this.logger.log(`Updating instance metadata on "${name}"`);

      const metadataResource = { ...payload.metadata, fingerprint: actual.metadataFingerprint };
      try {
        const [operation] = await cloud.instances.setMetadata({
          project,
          zone,
          instance: name,
          metadataResource,
        });
        await cloud.operations.waitForOperation(project, { name: operation.name, zone });
      } catch (error: unknown) {
        if (isReconcileError(error)) throw error;
        throw backendError(`error setting metadata on instance "${name}"`, error);
      }

      changes.metadata = undefined;
    }

    if (!isZero(changes)) {
      throw this.unsupportedChange(name, changedFields(changes));
    }
  }

  async renderTerraform(target: TerraformTarget, registry: GceRegistry): Promise<void> {
    const payload = await this.mapToGce(target.project, terraformAddress, registry);
    const tf = buildTerraformInstance(payload, {
      zone: this.required("zone", this.zone),
      network: this.network,
      subnet: this.subnet,
    });
    target.renderResource("google_compute_instance", tf.name, tf);
  }

  private unsupportedChange(name: string, fields: string[]): ReconcileError {
    this.logger.error(`Cannot apply changes to instance "${name}": ${fields.join(", ")}`);
    return new ReconcileError(
      `cannot apply changes to instance "${name}": ${fields.join(", ")}`,
      ReconcileErrorType.UNSUPPORTED_CHANGE,
      undefined,
      { fields }
    );
  }

  private required<V>(field: keyof InstanceFields, value: V | undefined): V {
    if (value === undefined) {
      throw new ReconcileError(
        `instance "${this.name ?? "<unnamed>"}" has no ${field}`,
        ReconcileErrorType.INVALID_SPEC
      );
    }
    return value;
  }
}

/**
 * Non-boot disks are keyed by device name and referenced by the disk name
 * in their source URL.
 */
function readAttachedDisk(disk: GceAttachedDisk): [string, PersistentDiskRef] {
  const source = disk.source ?? "";
  let diskName: string;
  try {
    diskName = parseGoogleCloudURL(source).name;
  } catch (error: unknown) {
    throw new ReconcileError(
      `unable to parse disk source URL "${source}"`,
      ReconcileErrorType.MALFORMED_IDENTIFIER,
      error
    );
  }
  if (!disk.deviceName) {
    throw new ReconcileError(
      `attached disk "${source}" has no device name`,
      ReconcileErrorType.MALFORMED_IDENTIFIER
    );
  }
  return [disk.deviceName, persistentDiskRef(diskName)];
}
