import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import type { RunSettings } from "../settings/runSettings.js";
import { SimEntity } from "./entity.js";

/** One database process, placed on one compute host. */
export class DBNode extends SimEntity {
  readonly ports: number[];
  private hostname: string | null = null;

  constructor(name: string, path: string, runSettings: RunSettings, ports: number[]) {
    super(name, path, runSettings);
    this.ports = [...ports];
  }

  get type(): string {
    return "DBNode";
  }

  get host(): string | null {
    return this.hostname;
  }

  setHost(host: string): void {
    this.hostname = host;
  }

  addresses(): string[] {
    if (!this.hostname) throw new ConfigurationError(`database node ${this.name} has no host assigned`);
    const host = this.hostname;
    return this.ports.map((port) => `${host}:${port}`);
  }

  override toJSON(): JsonObject {
    return { ...super.toJSON(), host: this.hostname, ports: [...this.ports] };
  }
}
