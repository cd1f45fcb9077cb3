import { ReconcileError, ReconcileErrorType } from "./errors";
import { ResourceRegistry, formatRef, ref } from "./registry";

interface TestRecords {
  Address: { name: string; address?: string };
  Disk: { name: string; zone?: string };
}

describe("ResourceRegistry", () => {
  it("should look up records by kind and name", () => {
    const registry = new ResourceRegistry<TestRecords>();
    registry.register("Address", { name: "ip-1", address: "203.0.113.10" });
    registry.register("Disk", { name: "ip-1", zone: "us-central1-a" });

    expect(registry.lookup(ref("Address", "ip-1"))).toEqual({ name: "ip-1", address: "203.0.113.10" });
    expect(registry.lookup(ref("Disk", "ip-1"))).toEqual({ name: "ip-1", zone: "us-central1-a" });
    expect(registry.lookup(ref("Disk", "other"))).toBeUndefined();
  });

  it("should reject a duplicate registration", () => {
    const registry = new ResourceRegistry<TestRecords>();
    registry.register("Disk", { name: "data" });

    let caught: unknown;
    try {
      registry.register("Disk", { name: "data" });
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReconcileError);
    expect(caught).toMatchObject({
      type: ReconcileErrorType.INVALID_SPEC,
      message: "Disk/data is already registered",
    });
  });

  it("should report an unregistered dependency as not ready", () => {
    const registry = new ResourceRegistry<TestRecords>();

    let caught: unknown;
    try {
      registry.require(ref("Address", "ip-1"));
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReconcileError);
    expect(caught).toMatchObject({
      type: ReconcileErrorType.DEPENDENCY_NOT_READY,
      message: "Address/ip-1 has not been registered",
    });
  });

  it("should format references", () => {
    expect(formatRef(ref("Network", "default"))).toBe("Network/default");
  });
});
