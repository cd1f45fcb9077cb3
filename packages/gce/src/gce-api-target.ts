/**
 * Live Compute Engine target. Tasks rendered here are applied immediately
 * through the cloud's SDK clients.
 */

import type { Target } from "@tidewater/core";
import type { GceCloud } from "./gce-cloud";

export class GceApiTarget implements Target {
  readonly kind = "gce" as const;
  readonly checkExisting = true;

  constructor(readonly cloud: GceCloud) {}

  get project(): string {
    return this.cloud.project;
  }
}
