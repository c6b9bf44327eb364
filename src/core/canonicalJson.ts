import { createHash } from "crypto";

export type Fingerprint = `sha256:${string}`;

export function sha256Prefixed(data: string | Buffer): Fingerprint {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function canonicalizeJson(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null) return null;

  switch (typeof value) {
    case "number":
      if (!Number.isFinite(value)) return null;
      return Object.is(value, -0) ? 0 : value;
    case "string":
    case "boolean":
      return value;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      return undefined;
    default:
      break;
  }

  if (Array.isArray(value)) {
    return value.map((v) => canonicalizeJson(v) ?? null);
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const c = canonicalizeJson(value[key]);
      if (c !== undefined) Object.defineProperty(out, key, { value: c, enumerable: true, writable: true, configurable: true });
    }
    return out;
  }

  // Settings and entity classes expose their hashable state only through toJSON().
  let json: unknown;
  try {
    json = JSON.parse(JSON.stringify(value)) as unknown;
  } catch {
    throw new Error("value is not JSON-serializable");
  }
  return canonicalizeJson(json);
}

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalizeJson(value));
}

export function fingerprintOf(value: unknown): Fingerprint {
  return sha256Prefixed(stableJsonStringify(value));
}
