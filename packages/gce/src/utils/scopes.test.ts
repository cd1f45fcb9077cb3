import { SCOPE_ALIASES, expandScopeAlias, shortenScope } from "./scopes";

describe("scope aliases", () => {
  const aliases = Object.keys(SCOPE_ALIASES);

  it("should define the seven standard aliases", () => {
    expect(aliases.sort()).toEqual([
      "compute-ro",
      "compute-rw",
      "logging-write",
      "monitoring",
      "monitoring-write",
      "storage-ro",
      "storage-rw",
    ]);
  });

  it.each(aliases)("should round-trip %s", (alias) => {
    const uri = expandScopeAlias(alias);
    expect(uri).toMatch(/^https:\/\/www\.googleapis\.com\/auth\//);
    expect(shortenScope(uri)).toBe(alias);
    expect(expandScopeAlias(shortenScope(uri))).toBe(uri);
  });

  it("should expand storage-ro to the read-only storage scope", () => {
    expect(expandScopeAlias("storage-ro")).toBe("https://www.googleapis.com/auth/devstorage.read_only");
  });

  it("should pass unknown values through in both directions", () => {
    expect(expandScopeAlias("https://www.googleapis.com/auth/cloud-platform")).toBe(
      "https://www.googleapis.com/auth/cloud-platform"
    );
    expect(shortenScope("https://www.googleapis.com/auth/cloud-platform")).toBe(
      "https://www.googleapis.com/auth/cloud-platform"
    );
    expect(expandScopeAlias("toString")).toBe("toString");
  });

  it("should not allow the table to be modified", () => {
    expect(Object.isFrozen(SCOPE_ALIASES)).toBe(true);
  });
});
