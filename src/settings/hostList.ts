export function normalizeHostList(value: unknown): string[] {
  if (typeof value === "string") return [value.trim()];
  if (!Array.isArray(value)) {
    throw new TypeError("host list must be a string or a list of strings");
  }
  const hosts: string[] = [];
  for (const host of value) {
    if (typeof host !== "string") throw new TypeError("host list must be a list of strings");
    hosts.push(host.trim());
  }
  return hosts;
}

export function assertPositiveInt(what: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new TypeError(`${what} must be a positive integer (got ${value})`);
  }
  return value;
}
