/**
 * GCE Cloud
 *
 * Authenticated handle to the Compute Engine APIs an instance pass needs,
 * plus the project/region/zone it operates in.
 */

import {
  AddressesClient,
  DisksClient,
  InstancesClient,
  ZoneOperationsClient,
} from "@google-cloud/compute";
import { GceCloudConfigSchema } from "./gce-config";
import type { GceCloudConfig, GceCloudConfigInput } from "./gce-config";
import { GceOperationManager } from "./managers";
import type { IGceOperationManager } from "./managers";

/**
 * SDK clients used by {@link GceCloud}.
 */
export interface GceCloudClients {
  instances: InstancesClient;
  disks: DisksClient;
  addresses: AddressesClient;
  zoneOperations: ZoneOperationsClient;
}

export class GceCloud {
  readonly project: string;
  readonly region: string;
  readonly zone: string;

  readonly instances: InstancesClient;
  readonly disks: DisksClient;
  readonly addresses: AddressesClient;
  readonly operations: IGceOperationManager;

  constructor(config: GceCloudConfig, clients: GceCloudClients, operations?: IGceOperationManager) {
    this.project = config.project;
    this.region = config.region;
    this.zone = config.zone;
    this.instances = clients.instances;
    this.disks = clients.disks;
    this.addresses = clients.addresses;
    this.operations =
      operations ?? new GceOperationManager(clients.zoneOperations, config.pollIntervalMs);
  }

  /**
   * Create the SDK clients from configuration. Credentials come from the key
   * file when one is given, Application Default Credentials otherwise.
   */
  static create(input: GceCloudConfigInput): GceCloud {
    const config = GceCloudConfigSchema.parse(input);
    const clientOptions = config.keyFilePath ? { keyFilename: config.keyFilePath } : {};

    return new GceCloud(config, {
      instances: new InstancesClient(clientOptions),
      disks: new DisksClient(clientOptions),
      addresses: new AddressesClient(clientOptions),
      zoneOperations: new ZoneOperationsClient(clientOptions),
    });
  }
}
