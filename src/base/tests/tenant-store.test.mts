import { beforeEach, describe, expect, it } from "vitest";
import { TenantStore } from "../tenant-store.mjs";

describe("TenantStore", () => {
  let store: TenantStore<string>;

  beforeEach(() => {
    store = new TenantStore<string>();
  });

  it("keeps identical keys in different tenants apart", () => {
    store.set("guild-a", "user-1", "value-a");
    store.set("guild-b", "user-1", "value-b");

    expect(store.get("guild-a", "user-1")).toBe("value-a");
    expect(store.get("guild-b", "user-1")).toBe("value-b");
  });

  it("returns undefined for unknown tenants and keys", () => {
    store.set("guild-a", "user-1", "value-a");

    expect(store.get("guild-b", "user-1")).toBeUndefined();
    expect(store.get("guild-a", "user-2")).toBeUndefined();
  });

  it("deletes only within the named tenant", () => {
    store.set("guild-a", "user-1", "value-a");
    store.set("guild-b", "user-1", "value-b");

    expect(store.delete("guild-a", "user-1")).toBe(true);
    expect(store.get("guild-a", "user-1")).toBeUndefined();
    expect(store.get("guild-b", "user-1")).toBe("value-b");
  });

  it("reports deleting a missing key", () => {
    store.set("guild-a", "user-1", "value-a");
    store.delete("guild-a", "user-1");

    expect(store.delete("guild-a", "user-1")).toBe(false);
    expect(store.delete("guild-b", "user-1")).toBe(false);
  });

  it("clears every tenant", () => {
    store.set("guild-a", "user-1", "one");
    store.set("guild-b", "user-1", "two");

    store.clear();

    expect(store.get("guild-a", "user-1")).toBeUndefined();
    expect(store.get("guild-b", "user-1")).toBeUndefined();
  });
});
