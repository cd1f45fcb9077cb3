import { ResourceRegistry } from "@tidewater/core";
import type { ReconcileContext } from "@tidewater/core";
import type { TerraformTarget } from "@tidewater/terraform";
import type { GceApiTarget } from "./gce-api-target";
import type { GceCloud } from "./gce-cloud";
import type { GceRecords } from "./tasks/references";

export type GceTarget = GceApiTarget | TerraformTarget;

export type GceContext = ReconcileContext<GceTarget, GceCloud, GceRecords>;

export function createGceContext(target: GceTarget, cloud: GceCloud): GceContext {
  return { target, cloud, registry: new ResourceRegistry<GceRecords>() };
}
