/**
 * GCE Operation Manager
 *
 * Polls zone operations at a fixed interval until they finish. There is no
 * backoff and no timeout: the caller must not assume a bounded wait.
 */

import { Logger } from "@nestjs/common";
import type { ZoneOperationsClient, protos } from "@google-cloud/compute";
import { ReconcileError, ReconcileErrorType, backendError } from "@tidewater/core";
import { lastComponent } from "../utils/urls";
import type { IGceOperationManager, OperationHandle } from "./interfaces";

type Operation = protos.google.cloud.compute.v1.IOperation;

export const DEFAULT_POLL_INTERVAL_MS = 1_000;

/**
 * Manages GCE zone operation polling.
 */
export class GceOperationManager implements IGceOperationManager {
  private readonly logger = new Logger(GceOperationManager.name);

  constructor(
    private readonly zoneOpsClient: ZoneOperationsClient,
    private readonly pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {}

  async waitForOperation(project: string, operation: OperationHandle): Promise<void> {
    if (!operation.name || !operation.zone) {
      throw new ReconcileError(
        "operation handle is missing its name or zone",
        ReconcileErrorType.MALFORMED_IDENTIFIER
      );
    }

    const operationName = lastComponent(operation.name);
    const zone = lastComponent(operation.zone);

    let status = await this.getOperationStatus(project, zone, operationName);
    while (String(status.status) !== "DONE") {
      this.logger.debug(`operation ${operationName} status=${String(status.status)}`);
      await this.sleep(this.pollIntervalMs);
      status = await this.getOperationStatus(project, zone, operationName);
    }

    const errors = status.error?.errors ?? [];
    if (errors.length > 0) {
      for (const e of errors) {
        this.logger.warn(`operation ${operationName} failed with error: ${e.code ?? ""} ${e.message ?? ""}`);
      }
      throw new ReconcileError(
        `operation failed: ${errors[0]?.message ?? "unknown error"}`,
        ReconcileErrorType.OPERATION_FAILED,
        undefined,
        { operation: operationName }
      );
    }

    const warnings = status.warnings ?? [];
    if (warnings.length > 0) {
      const summary = warnings.map((w) => w.message ?? w.code ?? "").join("; ");
      this.logger.warn(`operation ${operationName} completed with warnings: ${summary}`);
    }
  }

  private async getOperationStatus(
    project: string,
    zone: string,
    operationName: string
  ): Promise<Operation> {
    try {
      const [result] = await this.zoneOpsClient.get({ project, zone, operation: operationName });
      return result;
    } catch (error: unknown) {
      throw backendError("error fetching operation status", error);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
