/**
 * Merchant instances.
 *
 * One backend serves several instances, each with its own signing key and
 * wire accounts, loaded from a JSON file:
 *
 *   { "instances": [{ "id": "default", "merchant_priv": "<hex seed>",
 *                     "wire_methods": [{ "payto_uri": "payto://iban/...",
 *                                        "salt": "...", "active": true }] }] }
 *
 * Handlers hold a reference while they run; an instance removed while in
 * use stays alive until the last holder releases it.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  Hex32,
  fromHex,
  hashObject,
  publicKeyFromPrivate,
  toHex,
  type HashCode,
} from "@coinmerchant/primitives";

export const DEFAULT_INSTANCE = "default";

const PAYTO_RE = /^payto:\/\/([^/]+)\//;

export const WireMethodConfig = Type.Object({
  payto_uri: Type.String({ pattern: "^payto://[^/]+/" }),
  salt: Type.String({ minLength: 1 }),
  active: Type.Boolean(),
});

export const InstanceConfig = Type.Object({
  id: Type.String({ pattern: "^[A-Za-z0-9_-]+$" }),
  merchant_priv: Hex32,
  name: Type.Optional(Type.String()),
  wire_methods: Type.Array(WireMethodConfig, { minItems: 1 }),
});

export const InstancesFile = Type.Object({
  instances: Type.Array(InstanceConfig, { minItems: 1 }),
});

export type InstancesFile = Static<typeof InstancesFile>;

export interface WireMethod {
  /** Wire details as deposited with the exchange. */
  jWire: { payto_uri: string; salt: string };
  hWire: HashCode;
  /** payto target type, e.g. "iban" or "x-taler-bank". */
  wireMethod: string;
  active: boolean;
}

export interface MerchantInstance {
  id: string;
  name: string;
  merchantPriv: Uint8Array;
  merchantPub: string;
  wireMethods: WireMethod[];
}

export function wireMethodFor(instance: MerchantInstance, hWire: HashCode): WireMethod | null {
  return instance.wireMethods.find((wm) => wm.hWire === hWire) ?? null;
}

async function buildInstance(cfg: Static<typeof InstanceConfig>): Promise<MerchantInstance> {
  const merchantPriv = fromHex(cfg.merchant_priv);
  const merchantPub = toHex(await publicKeyFromPrivate(merchantPriv));
  const wireMethods = cfg.wire_methods.map((wm): WireMethod => {
    const type = PAYTO_RE.exec(wm.payto_uri)?.[1];
    if (type === undefined) throw new Error(`instance ${cfg.id}: bad payto URI ${wm.payto_uri}`);
    const jWire = { payto_uri: wm.payto_uri, salt: wm.salt };
    return { jWire, hWire: hashObject(jWire), wireMethod: type, active: wm.active };
  });
  return { id: cfg.id, name: cfg.name ?? cfg.id, merchantPriv, merchantPub, wireMethods };
}

export class InstanceRegistry {
  private readonly instances = new Map<string, MerchantInstance>();
  private readonly refs = new Map<string, number>();
  private readonly removing = new Set<string>();

  static async fromConfig(doc: unknown): Promise<InstanceRegistry> {
    if (!Value.Check(InstancesFile, doc)) {
      const first = Value.Errors(InstancesFile, doc).First();
      throw new Error(`invalid instances config at ${first?.path ?? "/"}: ${first?.message ?? "unknown"}`);
    }
    const registry = new InstanceRegistry();
    for (const cfg of doc.instances) {
      if (registry.instances.has(cfg.id)) throw new Error(`duplicate instance id: ${cfg.id}`);
      registry.instances.set(cfg.id, await buildInstance(cfg));
    }
    return registry;
  }

  static async load(path: string): Promise<InstanceRegistry> {
    const text = await readFile(path, "utf8");
    return InstanceRegistry.fromConfig(JSON.parse(text));
  }

  get ids(): string[] {
    return [...this.instances.keys()];
  }

  /** Take a reference; null when unknown or being removed. */
  acquire(id: string): MerchantInstance | null {
    const instance = this.instances.get(id);
    if (!instance || this.removing.has(id)) return null;
    this.refs.set(id, (this.refs.get(id) ?? 0) + 1);
    return instance;
  }

  release(instance: MerchantInstance): void {
    const count = (this.refs.get(instance.id) ?? 0) - 1;
    if (count > 0) {
      this.refs.set(instance.id, count);
      return;
    }
    this.refs.delete(instance.id);
    if (this.removing.delete(instance.id)) this.instances.delete(instance.id);
  }

  /** Remove now, or once the last reference is released. */
  remove(id: string): boolean {
    if (!this.instances.has(id)) return false;
    if (this.refCount(id) === 0) {
      this.instances.delete(id);
    } else {
      this.removing.add(id);
    }
    return true;
  }

  refCount(id: string): number {
    return this.refs.get(id) ?? 0;
  }

  has(id: string): boolean {
    return this.instances.has(id);
  }
}
