import { FileResource, StringResource } from "@tidewater/core";
import { ZodError } from "zod";
import { Instance } from "./instance";
import { parseInstanceSpec } from "./instance-spec";

describe("parseInstanceSpec", () => {
  it("should build a desired instance with references by name", () => {
    const instance = parseInstanceSpec({
      name: "web-1",
      zone: "us-central1-a",
      machineType: "e2-small",
      image: "debian-cloud/debian-12",
      tags: ["web"],
      network: "default",
      subnet: "web",
      ipAddress: "web-ip",
      disks: { data: "web-data" },
    });

    expect(instance).toBeInstanceOf(Instance);
    expect(instance).toMatchObject({
      name: "web-1",
      zone: "us-central1-a",
      tags: ["web"],
      network: { kind: "Network", name: "default" },
      subnet: { kind: "Subnet", name: "web" },
      ipAddress: { kind: "IPAddress", name: "web-ip" },
      disks: { data: { kind: "PersistentDisk", name: "web-data" } },
    });
    expect(instance.metadata).toBeUndefined();
    expect(instance.preemptible).toBeUndefined();
  });

  it("should turn metadata values into content sources", () => {
    const instance = parseInstanceSpec({
      name: "web-1",
      zone: "us-central1-a",
      metadata: { role: "web", "startup-script": { file: "/etc/test/startup.sh" } },
    });

    expect(instance.metadata?.role).toBeInstanceOf(StringResource);
    expect(instance.metadata?.["startup-script"]).toBeInstanceOf(FileResource);
    expect(instance.metadata?.["startup-script"]?.source).toBe("file /etc/test/startup.sh");
  });

  it("should reject an address without a network", () => {
    expect(() => parseInstanceSpec({ name: "web-1", zone: "us-central1-a", ipAddress: "web-ip" })).toThrow(
      "ipAddress requires a network"
    );
  });

  it.each([
    ["an invalid name", { name: "Web_1", zone: "us-central1-a" }],
    ["a missing zone", { name: "web-1" }],
    ["an unknown field", { name: "web-1", zone: "us-central1-a", labels: {} }],
  ])("should reject %s", (_case, input) => {
    expect(() => parseInstanceSpec(input)).toThrow(ZodError);
  });
});
