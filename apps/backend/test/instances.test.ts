import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fromHex, hashObject, publicKeyFromPrivate, toHex } from "@coinmerchant/primitives";
import { InstanceRegistry, wireMethodFor } from "../src/instances.js";
import { WIRE, testInstances } from "./fixtures.js";

describe("InstanceRegistry", () => {
  it("derives keys and wire hashes", async () => {
    const registry = await testInstances();
    const instance = registry.acquire("default");
    if (!instance) throw new Error("missing default instance");
    expect(instance.merchantPub).toBe(toHex(await publicKeyFromPrivate(fromHex("11".repeat(32)))));
    expect(instance.name).toBe("default");
    expect(instance.wireMethods).toEqual([
      { jWire: WIRE, hWire: hashObject(WIRE), wireMethod: "x-taler-bank", active: true },
    ]);
    expect(wireMethodFor(instance, hashObject(WIRE))?.wireMethod).toBe("x-taler-bank");
    expect(wireMethodFor(instance, "00".repeat(32))).toBeNull();
    expect(registry.ids).toEqual(["default", "books"]);
  });

  it("rejects duplicate ids", async () => {
    const cfg = { id: "a", merchant_priv: "11".repeat(32), wire_methods: [{ ...WIRE, active: true }] };
    await expect(InstanceRegistry.fromConfig({ instances: [cfg, cfg] })).rejects.toThrow("duplicate instance id: a");
  });

  it("rejects malformed configuration", async () => {
    const cfg = { id: "a", merchant_priv: "not-hex", wire_methods: [{ ...WIRE, active: true }] };
    await expect(InstanceRegistry.fromConfig({ instances: [cfg] })).rejects.toThrow(/^invalid instances config/);
  });

  it("defers removal until the last reference is released", async () => {
    const registry = await testInstances();
    const held = registry.acquire("books");
    if (!held) throw new Error("missing books instance");
    expect(registry.refCount("books")).toBe(1);

    expect(registry.remove("books")).toBe(true);
    expect(registry.has("books")).toBe(true);
    expect(registry.acquire("books")).toBeNull();

    registry.release(held);
    expect(registry.has("books")).toBe(false);
    expect(registry.refCount("books")).toBe(0);
  });

  it("removes an unused instance at once", async () => {
    const registry = await testInstances();
    expect(registry.remove("books")).toBe(true);
    expect(registry.has("books")).toBe(false);
    expect(registry.remove("books")).toBe(false);
  });

  it("loads instances from a file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "instances-test-"));
    try {
      const path = join(dir, "instances.json");
      await writeFile(
        path,
        JSON.stringify({
          instances: [{ id: "kiosk", name: "Kiosk", merchant_priv: "33".repeat(32), wire_methods: [{ ...WIRE, active: false }] }],
        }),
      );
      const registry = await InstanceRegistry.load(path);
      expect(registry.ids).toEqual(["kiosk"]);
      expect(registry.acquire("kiosk")?.name).toBe("Kiosk");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
