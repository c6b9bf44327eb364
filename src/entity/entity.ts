import type { JsonObject } from "../core/json.js";
import type { RunSettings } from "../settings/runSettings.js";

/** Anything the launcher can start: a name unique within its owner, a working path and its run settings. */
export abstract class SimEntity {
  readonly name: string;
  path: string;
  readonly runSettings: RunSettings;

  protected constructor(name: string, path: string, runSettings: RunSettings) {
    if (!name.trim()) throw new TypeError("entity name must be non-empty");
    this.name = name;
    this.path = path;
    this.runSettings = runSettings;
  }

  abstract get type(): string;

  equals(other: SimEntity): boolean {
    return this.name === other.name;
  }

  setPath(path: string): void {
    this.path = path;
  }

  toJSON(): JsonObject {
    return {
      name: this.name,
      type: this.type,
      path: this.path,
      run_settings: this.runSettings.toJSON(),
      launch_command: this.runSettings.launchCommand()
    };
  }
}
