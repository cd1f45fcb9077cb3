import { Logger } from "@nestjs/common";
import { ReconcileErrorType } from "@tidewater/core";
import { GceOperationManager } from "./gce-operation-manager";

// ── Test helpers ───────────────────────────────────────────────────────

function createManager() {
  const zoneOpsClient = { get: jest.fn() };
  const manager = new GceOperationManager(zoneOpsClient as never, 0);
  return { manager, zoneOpsClient };
}

const handle = {
  name: "operation-1234",
  zone: "https://www.googleapis.com/compute/v1/projects/test-project/zones/us-central1-a",
};

// ── Tests ──────────────────────────────────────────────────────────────

describe("GceOperationManager", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, "debug").mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should return once the operation is DONE without errors", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockResolvedValueOnce([{ status: "DONE" }]);

    await expect(manager.waitForOperation("test-project", handle)).resolves.toBeUndefined();
    expect(zoneOpsClient.get).toHaveBeenCalledWith({
      project: "test-project",
      zone: "us-central1-a",
      operation: "operation-1234",
    });
  });

  it("should keep polling while the operation is pending or running", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get
      .mockResolvedValueOnce([{ status: "PENDING" }])
      .mockResolvedValueOnce([{ status: "RUNNING" }])
      .mockResolvedValueOnce([{ status: "RUNNING" }])
      .mockResolvedValueOnce([{ status: "DONE" }]);

    await manager.waitForOperation("test-project", handle);

    expect(zoneOpsClient.get).toHaveBeenCalledTimes(4);
  });

  it("should fail with the first error message and log every error", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockResolvedValueOnce([
      {
        status: "DONE",
        error: {
          errors: [
            { code: "QUOTA_EXCEEDED", message: "quota exceeded" },
            { code: "INTERNAL", message: "internal error" },
          ],
        },
      },
    ]);

    await expect(manager.waitForOperation("test-project", handle)).rejects.toMatchObject({
      type: ReconcileErrorType.OPERATION_FAILED,
      message: "operation failed: quota exceeded",
    });
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("should succeed with a warning when the operation reports warnings only", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockResolvedValueOnce([
      { status: "DONE", warnings: [{ code: "NO_RESULTS_ON_PAGE", message: "nothing to do" }] },
    ]);

    await expect(manager.waitForOperation("test-project", handle)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith("operation operation-1234 completed with warnings: nothing to do");
  });

  it("should not return while the operation never finishes", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockResolvedValue([{ status: "RUNNING" }]);

    let settled = false;
    const wait = manager.waitForOperation("test-project", handle).finally(() => {
      settled = true;
    });

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(settled).toBe(false);
    expect(zoneOpsClient.get.mock.calls.length).toBeGreaterThan(1);

    zoneOpsClient.get.mockResolvedValue([{ status: "DONE" }]);
    await wait;
    expect(settled).toBe(true);
  });

  it("should wrap status query failures", async () => {
    const { manager, zoneOpsClient } = createManager();
    zoneOpsClient.get.mockRejectedValueOnce(new Error("connection reset"));

    await expect(manager.waitForOperation("test-project", handle)).rejects.toMatchObject({
      type: ReconcileErrorType.BACKEND,
      message: "error fetching operation status: connection reset",
    });
  });

  it("should reject a handle without a name", async () => {
    const { manager, zoneOpsClient } = createManager();

    await expect(manager.waitForOperation("test-project", { zone: "us-central1-a" })).rejects.toMatchObject({
      type: ReconcileErrorType.MALFORMED_IDENTIFIER,
    });
    expect(zoneOpsClient.get).not.toHaveBeenCalled();
  });
});
