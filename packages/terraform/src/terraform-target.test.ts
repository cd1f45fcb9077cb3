import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Logger } from "@nestjs/common";
import { TerraformTarget, literalProperty, tfSanitize } from "./terraform-target";

describe("TerraformTarget", () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, "debug").mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should be a template target that never checks live state", () => {
    const target = new TerraformTarget({ project: "test-project", region: "us-central1" });
    expect(target.kind).toBe("terraform");
    expect(target.checkExisting).toBe(false);
  });

  it("should collect resources under their type and sanitized name", () => {
    const target = new TerraformTarget({ project: "test-project", region: "us-central1" });
    target.renderResource("google_compute_instance", "master.example.com", { name: "master.example.com" });

    expect(target.toJSON()).toEqual({
      provider: { google: { project: "test-project", region: "us-central1" } },
      resource: {
        google_compute_instance: {
          "master-example-com": { name: "master.example.com" },
        },
      },
    });
  });

  it("should reject rendering the same resource twice", () => {
    const target = new TerraformTarget({ project: "test-project", region: "us-central1" });
    target.renderResource("google_compute_instance", "web", {});

    expect(() => target.renderResource("google_compute_instance", "web", {})).toThrow(
      "resource google_compute_instance.web has already been rendered"
    );
  });

  it("should reject an invalid config", () => {
    expect(() => new TerraformTarget({ project: "", region: "us-central1" })).toThrow();
  });

  describe("finish", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "tidewater-tf-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("should write the document to outDir", async () => {
      const outDir = join(dir, "out");
      const target = new TerraformTarget({ project: "test-project", region: "us-central1", outDir });
      target.renderResource("google_compute_address", "ip", { name: "ip" });

      const text = await target.finish();
      const written = await readFile(join(outDir, "main.tf.json"), "utf8");

      expect(written).toBe(text);
      expect(JSON.parse(written)).toEqual({
        provider: { google: { project: "test-project", region: "us-central1" } },
        resource: { google_compute_address: { ip: { name: "ip" } } },
      });
    });

    it("should only return the text when no outDir is configured", async () => {
      const target = new TerraformTarget({ project: "test-project", region: "us-central1" });
      const text = await target.finish();
      expect(text.endsWith("}\n")).toBe(true);
      expect(JSON.parse(text).resource).toEqual({});
    });
  });
});

describe("literalProperty", () => {
  it("should build an interpolation expression", () => {
    expect(literalProperty("google_compute_address", "bastion", "address")).toBe(
      "${google_compute_address.bastion.address}"
    );
  });

  it("should sanitize the resource name", () => {
    expect(literalProperty("google_compute_network", "a.b", "name")).toBe("${google_compute_network.a-b.name}");
    expect(tfSanitize("no-dots")).toBe("no-dots");
  });
});
