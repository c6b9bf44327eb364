import type { ComposerConfig } from "../config/config.js";
import { fingerprintOf, type Fingerprint } from "../core/canonicalJson.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import type { DBNode } from "../entity/dbNode.js";
import { EntityList } from "../entity/entityList.js";
import type { RunArgValue } from "../settings/runSettings.js";
import { assertPositiveInt } from "../settings/hostList.js";

export interface OrchestratorOptions {
  config: ComposerConfig;
  /** Defaults to the configured database port. */
  port?: number;
  dbNodes?: number;
  batch?: boolean;
  runCommand?: string;
  /** Extra launch-binary options applied to every node. */
  runArgs?: Record<string, RunArgValue>;
  threadsPerQueue?: number;
  interOpThreads?: number;
  intraOpThreads?: number;
  name?: string;
  path?: string;
  logger?: Logger;
}

/** Clustering starts at three nodes. */
export const MIN_CLUSTER_NODES = 3;

/**
 * Shared state of a key-value database deployment: node count, port, cluster
 * mode and the per-node server arguments. Scheduler-specific subclasses decide
 * how nodes are launched and placed.
 */
export abstract class Orchestrator extends EntityList<DBNode> {
  readonly port: number;
  readonly dbNodeCount: number;
  readonly batch: boolean;
  readonly runCommand: string;
  readonly cluster: boolean;
  ports: number[] = [];
  protected readonly config: ComposerConfig;
  private readonly threads: { threadsPerQueue?: number; interOpThreads?: number; intraOpThreads?: number };

  protected constructor(options: OrchestratorOptions, defaults: { batch: boolean; runCommand: string }) {
    super(options.name ?? "orchestrator", options.path ?? process.cwd());
    this.config = options.config;
    this.port = options.port ?? options.config.defaultPort();
    if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new TypeError(`port must be an integer between 1 and 65535 (got ${this.port})`);
    }
    this.dbNodeCount = assertPositiveInt("db_nodes", options.dbNodes ?? 1);
    this.batch = options.batch ?? defaults.batch;
    this.runCommand = options.runCommand ?? defaults.runCommand;
    this.cluster = this.dbNodeCount >= MIN_CLUSTER_NODES;
    this.threads = {
      threadsPerQueue: options.threadsPerQueue,
      interOpThreads: options.interOpThreads,
      intraOpThreads: options.intraOpThreads
    };
  }

  get type(): string {
    return "Orchestrator";
  }

  get dbNodes(): readonly DBNode[] {
    return this.entities;
  }

  /** Hosts assigned so far, in node order. */
  hosts(): string[] {
    return this.dbNodes.flatMap((node) => (node.host ? [node.host] : []));
  }

  /** `host:port` for every node; every node must have a host. */
  addresses(): string[] {
    return this.dbNodes.flatMap((node) => node.addresses());
  }

  clusterArgs(nodeName: string, port: number): string[] {
    return ["--cluster-enabled", "yes", "--cluster-config-file", `nodes-${nodeName}-${port}.conf`];
  }

  /** Server arguments for one node; cluster bootstrap flags are appended in cluster mode. */
  nodeExeArgs(nodeName: string): string[] {
    const args = [this.config.databaseConf(), ...this.aiModuleArgs(), ...this.ipModuleArgs(), "--port", String(this.port)];
    if (this.cluster) args.push(...this.clusterArgs(nodeName, this.port));
    return args;
  }

  toJSON(): JsonObject {
    return {
      name: this.name,
      type: this.type,
      path: this.path,
      db_nodes: this.dbNodeCount,
      cluster: this.cluster,
      batch: this.batch,
      run_command: this.runCommand,
      ports: [...this.ports],
      nodes: this.dbNodes.map((n) => n.toJSON()),
      batch_settings: this.batchSettingsJson()
    };
  }

  fingerprint(): Fingerprint {
    return fingerprintOf(this.toJSON());
  }

  protected batchSettingsJson(): JsonObject | null {
    return null;
  }

  protected addNode(node: DBNode): void {
    this.addEntity(node);
  }

  private aiModuleArgs(): string[] {
    const modulePath = this.config.aiModule();
    if (!modulePath) return [];
    const args = ["--loadmodule", modulePath];
    const { threadsPerQueue, interOpThreads, intraOpThreads } = this.threads;
    if (threadsPerQueue !== undefined) args.push("THREADS_PER_QUEUE", String(assertPositiveInt("threads per queue", threadsPerQueue)));
    if (interOpThreads !== undefined) args.push("INTER_OP_PARALLELISM", String(assertPositiveInt("inter-op threads", interOpThreads)));
    if (intraOpThreads !== undefined) args.push("INTRA_OP_PARALLELISM", String(assertPositiveInt("intra-op threads", intraOpThreads)));
    return args;
  }

  private ipModuleArgs(): string[] {
    const modulePath = this.config.ipModule();
    return modulePath ? ["--loadmodule", modulePath] : [];
  }
}
