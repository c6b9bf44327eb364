import { UnsupportedCapabilityError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";

export type RunArgValue = string | number | null;

export interface RunSettingsInit {
  exeArgs?: string | string[];
  runArgs?: Record<string, RunArgValue>;
  envVars?: Record<string, string>;
}

function toArgList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  if (typeof value === "string") return value.split(/\s+/).filter((a) => a.length > 0);
  return [...value];
}

/**
 * How a single entity is executed: an executable, its arguments, and the
 * launch-binary options that wrap it.
 *
 * The generic form runs the executable directly (no launch binary). Subclasses
 * bind a run command and know how to express task counts, cpus and host
 * placement in that command's flags.
 */
export class RunSettings {
  readonly exe: string;
  exeArgs: string[];
  runArgs: Record<string, RunArgValue>;
  envVars: Record<string, string>;

  constructor(exe: string, init: RunSettingsInit = {}) {
    if (!exe.trim()) throw new TypeError("run settings require an executable");
    this.exe = exe;
    this.exeArgs = toArgList(init.exeArgs);
    this.runArgs = { ...(init.runArgs ?? {}) };
    this.envVars = { ...(init.envVars ?? {}) };
  }

  get runCommand(): string | null {
    return null;
  }

  setTasks(_tasks: number): void {
    throw this.unsupported("set a task count");
  }

  setTasksPerNode(_tasksPerNode: number): void {
    throw this.unsupported("set tasks per node");
  }

  setCpusPerTask(_cpusPerTask: number): void {
    throw this.unsupported("set cpus per task");
  }

  setHostlist(_hosts: string | string[]): void {
    throw this.unsupported("set a host list");
  }

  setRunArg(key: string, value: RunArgValue = null): void {
    this.runArgs[key] = value;
  }

  addExeArgs(args: string | string[]): void {
    this.exeArgs.push(...toArgList(args));
  }

  formatRunArgs(): string[] {
    return [];
  }

  formatEnvVars(): string[] {
    return [];
  }

  launchCommand(): string[] {
    const prefix = this.runCommand ? [this.runCommand, ...this.formatEnvVars(), ...this.formatRunArgs()] : [];
    return [...prefix, this.exe, ...this.exeArgs];
  }

  clone(): RunSettings {
    return new RunSettings(this.exe, this.cloneState());
  }

  toJSON(): JsonObject {
    return {
      exe: this.exe,
      exe_args: [...this.exeArgs],
      run_command: this.runCommand,
      run_args: { ...this.runArgs },
      env_vars: { ...this.envVars }
    };
  }

  protected cloneState(): Required<RunSettingsInit> {
    return {
      exeArgs: [...this.exeArgs],
      runArgs: { ...this.runArgs },
      envVars: { ...this.envVars }
    };
  }

  private unsupported(what: string): UnsupportedCapabilityError {
    return new UnsupportedCapabilityError(
      `run settings for ${this.runCommand ?? "direct execution"} cannot ${what}`,
      ["aprun", "mpirun"]
    );
  }
}
