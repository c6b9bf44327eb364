import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";
import { assertPositiveInt, normalizeHostList } from "./hostList.js";

export type BatchArgValue = string | number | null;

/**
 * Submission options for running a group of entities as one workload-manager
 * batch job. `batchArgs` is the raw option table; `formatBatchArgs` turns it
 * into the flags the batch command accepts.
 */
export class BatchSettings {
  readonly batchCmd: string;
  batchArgs: Record<string, BatchArgValue>;

  constructor(batchCmd: string, batchArgs: Record<string, BatchArgValue> = {}) {
    this.batchCmd = batchCmd;
    this.batchArgs = { ...batchArgs };
  }

  setBatchArg(key: string, value: BatchArgValue = null): void {
    this.batchArgs[key] = value;
  }

  formatBatchArgs(): string[] {
    return Object.entries(this.batchArgs).map(([k, v]) => (v === null ? `--${k}` : `--${k}=${v}`));
  }

  clone(): BatchSettings {
    return new BatchSettings(this.batchCmd, this.batchArgs);
  }

  toJSON(): JsonObject {
    return { batch_cmd: this.batchCmd, batch_args: { ...this.batchArgs } };
  }
}

export interface QsubBatchInit {
  nodes?: number | null;
  ncpus?: number | null;
  time?: string | null;
  queue?: string | null;
  account?: string | null;
  resources?: Record<string, string | number>;
  batchArgs?: Record<string, BatchArgValue>;
}

// Output and error paths are written by the rendered script itself.
const RESERVED_QSUB_ARGS = new Set(["e", "o"]);

/** PBS Pro `qsub` submission options. */
export class QsubBatchSettings extends BatchSettings {
  nodes: number | null;
  ncpus: number | null;
  time: string | null;
  hosts: string[] | null = null;
  resources: Record<string, string | number>;

  constructor(init: QsubBatchInit = {}) {
    super("qsub");
    this.nodes = init.nodes ?? null;
    this.ncpus = init.ncpus ?? null;
    this.time = init.time ?? null;
    this.resources = { ...(init.resources ?? {}) };
    for (const [k, v] of Object.entries(init.batchArgs ?? {})) this.setBatchArg(k, v);
    if (init.account) this.setAccount(init.account);
    if (init.queue) this.setQueue(init.queue);
  }

  setNodes(nodes: number): void {
    this.nodes = assertPositiveInt("nodes", nodes);
  }

  setNcpus(ncpus: number): void {
    this.ncpus = assertPositiveInt("ncpus", ncpus);
  }

  /** Walltime in `HH:MM:SS`. */
  setWalltime(walltime: string): void {
    this.time = walltime;
  }

  setHostlist(hosts: string | string[]): void {
    this.hosts = normalizeHostList(hosts);
  }

  setQueue(queue: string): void {
    this.batchArgs["q"] = queue;
  }

  setAccount(account: string): void {
    this.batchArgs["A"] = account;
  }

  setResource(name: string, value: string | number): void {
    this.resources[name] = value;
  }

  override setBatchArg(key: string, value: BatchArgValue = null): void {
    if (RESERVED_QSUB_ARGS.has(key)) {
      throw new ConfigurationError(`qsub argument -${key} is managed by the batch script and cannot be overridden`);
    }
    super.setBatchArg(key, value);
  }

  override formatBatchArgs(): string[] {
    const opts = this.resourceList();
    for (const [opt, value] of Object.entries(this.batchArgs)) {
      opts.push(value === null || value === "" ? `-${opt}` : `-${opt} ${value}`);
    }
    return opts;
  }

  override clone(): QsubBatchSettings {
    const copy = new QsubBatchSettings({
      nodes: this.nodes,
      ncpus: this.ncpus,
      time: this.time,
      resources: this.resources,
      batchArgs: this.batchArgs
    });
    copy.hosts = this.hosts ? [...this.hosts] : null;
    return copy;
  }

  override toJSON(): JsonObject {
    return {
      ...super.toJSON(),
      nodes: this.nodes,
      ncpus: this.ncpus,
      time: this.time,
      hosts: this.hosts ? [...this.hosts] : null,
      resources: { ...this.resources }
    };
  }

  private resourceList(): string[] {
    const res: string[] = [];
    const select = this.resources["select"];
    if (select !== undefined) {
      res.push(`-l select=${select}`);
    } else {
      if (!this.nodes) {
        throw new ConfigurationError("insufficient qsub resource specification: no nodes or select statement");
      }
      let stmt = `-l select=${this.nodes}`;
      if (this.ncpus) stmt += `:ncpus=${this.ncpus}`;
      if (this.hosts && this.hosts.length > 0) stmt += `:${this.hosts.map((h) => `host=${h}`).join("+")}`;
      res.push(stmt);
    }

    const place = this.resources["place"];
    res.push(`-l place=${place ?? "scatter"}`);
    if (this.time) res.push(`-l walltime=${this.time}`);

    for (const [name, value] of Object.entries(this.resources)) {
      if (name === "select" || name === "place" || name === "walltime") continue;
      res.push(`-l ${name}=${value}`);
    }
    return res;
  }
}
