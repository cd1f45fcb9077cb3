/**
 * Terraform Target
 *
 * Collects resource blocks from tasks and emits them as one Terraform JSON
 * document. Nothing here talks to the cloud: references between resources
 * are written as interpolation expressions and resolved by terraform when
 * the document is applied.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Logger } from "@nestjs/common";
import type { Target } from "@tidewater/core";
import { TerraformTargetConfigSchema } from "./terraform-config";
import type { TerraformTargetConfig, TerraformTargetConfigInput } from "./terraform-config";

export interface TerraformDocument {
  provider: {
    google: {
      project: string;
      region: string;
    };
  };
  resource: Record<string, Record<string, object>>;
}

/**
 * Terraform resource names may not contain dots.
 */
export function tfSanitize(name: string): string {
  return name.replace(/\./g, "-");
}

/**
 * Interpolation expression for a property of another rendered resource,
 * e.g. `${google_compute_address.bastion.address}`.
 */
export function literalProperty(resourceType: string, resourceName: string, prop: string): string {
  return "${" + `${resourceType}.${tfSanitize(resourceName)}.${prop}` + "}";
}

export class TerraformTarget implements Target {
  readonly kind = "terraform" as const;
  readonly checkExisting = false;

  readonly project: string;
  readonly region: string;

  private readonly logger = new Logger(TerraformTarget.name);
  private readonly config: TerraformTargetConfig;
  private readonly resources: Record<string, Record<string, object>> = {};

  constructor(config: TerraformTargetConfigInput) {
    this.config = TerraformTargetConfigSchema.parse(config);
    this.project = this.config.project;
    this.region = this.config.region;
  }

  renderResource(resourceType: string, resourceName: string, block: object): void {
    const name = tfSanitize(resourceName);
    const byType = this.resources[resourceType] ?? {};
    this.resources[resourceType] = byType;
    if (name in byType) {
      throw new Error(`resource ${resourceType}.${name} has already been rendered`);
    }
    byType[name] = block;
    this.logger.debug(`rendered ${resourceType}.${name}`);
  }

  toJSON(): TerraformDocument {
    return {
      provider: {
        google: {
          project: this.project,
          region: this.region,
        },
      },
      resource: this.resources,
    };
  }

  /**
   * Serialize the collected document, writing it to outDir when one is
   * configured. Returns the JSON text.
   */
  async finish(): Promise<string> {
    const text = JSON.stringify(this.toJSON(), null, 2) + "\n";

    if (this.config.outDir) {
      const path = join(this.config.outDir, this.config.fileName);
      await mkdir(this.config.outDir, { recursive: true });
      await writeFile(path, text, "utf8");
      this.logger.log(`wrote terraform to ${path}`);
    }

    return text;
  }
}
