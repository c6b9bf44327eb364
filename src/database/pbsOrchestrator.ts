import { ConfigurationError, TopologyConstraintError } from "../core/errors.js";
import { entityName } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { createLogger, type Logger } from "../core/logger.js";
import { DBNode } from "../entity/dbNode.js";
import { QsubBatchSettings, type BatchArgValue } from "../settings/batchSettings.js";
import { assertPositiveInt, normalizeHostList } from "../settings/hostList.js";
import { renderQsubScript } from "../settings/qsubScript.js";
import { Orchestrator, type OrchestratorOptions } from "./orchestrator.js";
import { lookupRunCommand, type RunCommandFamily } from "./runCommands.js";

export interface PBSOrchestratorOptions extends OrchestratorOptions {
  /** Compute node names; required for mpirun. */
  hosts?: string | string[] | null;
  /** Batch account (`qsub -A`). */
  account?: string | null;
  /** Batch walltime, `HH:MM:SS`. */
  time?: string | null;
  /** Batch queue (`qsub -q`). */
  queue?: string | null;
}

/**
 * Database deployment for PBS Pro systems, one database process per node.
 *
 * Launches as a batch job by default; with `batch: false` the nodes are meant
 * to run inside an existing interactive allocation. Two-node deployments are
 * rejected because the clustering protocol needs at least three members.
 */
export class PBSOrchestrator extends Orchestrator {
  readonly batchSettings: QsubBatchSettings | null;
  private readonly family: RunCommandFamily;
  private readonly log: Logger;

  constructor(options: PBSOrchestratorOptions) {
    super(options, { batch: true, runCommand: "aprun" });
    this.log = options.logger ?? createLogger("pbs-orchestrator");

    if (this.dbNodeCount === 2) {
      throw new TopologyConstraintError("PBSOrchestrator does not support clusters of size 2");
    }
    this.family = lookupRunCommand(this.runCommand, "PBSOrchestrator");

    const hosts = options.hosts ? normalizeHostList(options.hosts) : [];
    if (hosts.length === 0 && this.family.requiresHosts) {
      throw new TopologyConstraintError(
        `hosts argument is required when launching PBSOrchestrator with ${this.family.runCommand}`
      );
    }

    for (let i = 0; i < this.dbNodeCount; i++) {
      const name = entityName(this.name, i);
      const settings = this.family.buildSettings(this.config.databaseExe(), this.nodeExeArgs(name), options.runArgs ?? {});
      this.addNode(new DBNode(name, this.path, settings, [this.port]));
      this.log.debug({ orchestrator: this.name, node: name, cluster: this.cluster }, "created database node");
    }
    this.ports = [this.port];

    this.batchSettings = this.batch
      ? new QsubBatchSettings({
          nodes: this.dbNodeCount,
          ncpus: 1,
          time: options.time ?? null,
          queue: options.queue ?? null,
          account: options.account ?? null
        })
      : null;

    if (hosts.length > 0) this.setHosts(hosts);
  }

  /** Assign compute hosts to nodes, pairwise in node order. */
  setHosts(hostList: unknown): void {
    const hosts = normalizeHostList(hostList);
    if (hosts.length !== this.dbNodeCount) {
      this.log.warn(
        { orchestrator: this.name, hosts: hosts.length, nodes: this.dbNodeCount },
        "host list length does not match the number of database nodes"
      );
    }
    if (this.batchSettings) this.batchSettings.setHostlist(hosts);

    const placeInRunSettings = !this.batch || this.family.hostlistInBatch;
    this.dbNodes.forEach((node, i) => {
      const host = hosts[i];
      if (host === undefined) return;
      node.setHost(host);
      if (placeInRunSettings) node.runSettings.setHostlist([host]);
    });
  }

  /** CPUs available to each database shard (compute, background and network threads). */
  setCpus(numCpus: number): void {
    assertPositiveInt("num_cpus", numCpus);
    if (this.batchSettings) this.batchSettings.setNcpus(numCpus);
    for (const node of this) node.runSettings.setCpusPerTask(numCpus);
  }

  setWalltime(walltime: string): void {
    this.requireBatch("cannot set walltime").setWalltime(walltime);
  }

  setBatchArg(arg: string, value: BatchArgValue = null): void {
    this.requireBatch("cannot set batch argument").setBatchArg(arg, value);
  }

  /** argv per node, keyed by node name. */
  launchCommands(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const node of this) out[node.name] = node.runSettings.launchCommand();
    return out;
  }

  batchScript(): string {
    const batch = this.requireBatch("cannot render a batch script");
    return renderQsubScript({
      jobName: this.name,
      workDir: this.path,
      batch,
      steps: this.dbNodes.map((node) => ({ name: node.name, argv: node.runSettings.launchCommand() }))
    });
  }

  protected override batchSettingsJson(): JsonObject | null {
    if (!this.batchSettings) return null;
    return { ...this.batchSettings.toJSON(), formatted: this.batchSettings.formatBatchArgs() };
  }

  private requireBatch(action: string): QsubBatchSettings {
    if (!this.batchSettings) throw new ConfigurationError(`not running as batch, ${action}`);
    return this.batchSettings;
  }
}
