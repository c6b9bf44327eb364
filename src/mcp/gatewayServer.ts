import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ComposerConfig } from "../config/config.js";
import { ComposerError } from "../core/errors.js";
import { createLogger, type Logger } from "../core/logger.js";
import { PBSOrchestrator } from "../database/pbsOrchestrator.js";
import { Ensemble } from "../ensemble/ensemble.js";
import { AprunSettings } from "../settings/aprunSettings.js";
import { QsubBatchSettings } from "../settings/batchSettings.js";
import { MpirunSettings } from "../settings/mpirunSettings.js";
import { RunSettings } from "../settings/runSettings.js";
import {
  zEnsembleComposeInput,
  zEnsembleComposeOutput,
  zOrchestratorComposeInput,
  zOrchestratorComposeOutput,
  type QsubBatchInput,
  type RunSettingsInput
} from "./toolSchemas.js";

export interface GatewayDeps {
  config: ComposerConfig;
  logger?: Logger;
}

function buildRunSettings(input: RunSettingsInput): RunSettings {
  const init = { exeArgs: input.exe_args, runArgs: input.run_args, envVars: input.env_vars };
  switch (input.run_command) {
    case "aprun":
      return new AprunSettings(input.exe, init);
    case "mpirun":
      return new MpirunSettings(input.exe, init);
    case null:
      return new RunSettings(input.exe, init);
  }
}

function buildBatchSettings(input: QsubBatchInput): QsubBatchSettings {
  const settings = new QsubBatchSettings({
    nodes: input.nodes ?? null,
    ncpus: input.ncpus ?? null,
    time: input.time ?? null,
    queue: input.queue ?? null,
    account: input.account ?? null,
    resources: input.resources
  });
  for (const [k, v] of Object.entries(input.batch_args)) settings.setBatchArg(k, v);
  return settings;
}

// Composition failures are deterministic input errors; report them as invalid params.
function toMcpError(e: unknown): unknown {
  if (e instanceof ComposerError || e instanceof TypeError) {
    return new McpError(ErrorCode.InvalidParams, `${e.name}: ${e.message}`);
  }
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const log = deps.logger ?? createLogger("gateway");
  const mcp = new McpServer({
    name: "ensemble-fabric-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "ensemble_compose",
    {
      description:
        "Expand a parameter space (or a replica count) into named model run units with independent run settings. Nothing is launched.",
      inputSchema: zEnsembleComposeInput,
      outputSchema: zEnsembleComposeOutput
    },
    async (args) => {
      try {
        const ensemble = new Ensemble(args.name, args.params, {
          runSettings: args.run_settings ? buildRunSettings(args.run_settings) : null,
          batchSettings: args.batch_settings ? buildBatchSettings(args.batch_settings) : null,
          permStrategy: args.perm_strategy,
          replicas: args.replicas ?? null,
          strategyOptions: args.count === undefined ? {} : { count: args.count },
          path: args.path
        });
        const fingerprint = ensemble.fingerprint();
        log.info({ ensemble: ensemble.name, members: ensemble.length, fingerprint }, "composed ensemble");

        return {
          content: [{ type: "text", text: `Composed ensemble ${ensemble.name} with ${ensemble.length} members` }],
          structuredContent: { fingerprint, ensemble: ensemble.toJSON() }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "orchestrator_compose",
    {
      description:
        "Resolve a PBS database topology: node names, ports, cluster mode, per-node launch commands and the qsub script when batched. Nothing is launched.",
      inputSchema: zOrchestratorComposeInput,
      outputSchema: zOrchestratorComposeOutput
    },
    async (args) => {
      try {
        const orc = new PBSOrchestrator({
          config: deps.config,
          name: args.name,
          port: args.port,
          dbNodes: args.db_nodes,
          batch: args.batch,
          runCommand: args.run_command,
          hosts: args.hosts ?? null,
          runArgs: args.run_args,
          account: args.account ?? null,
          time: args.time ?? null,
          queue: args.queue ?? null,
          threadsPerQueue: args.threads_per_queue,
          interOpThreads: args.inter_op_threads,
          intraOpThreads: args.intra_op_threads,
          path: args.path,
          logger: log
        });
        if (args.cpus !== undefined) orc.setCpus(args.cpus);
        for (const [k, v] of Object.entries(args.batch_args)) orc.setBatchArg(k, v);

        const fingerprint = orc.fingerprint();
        log.info(
          { orchestrator: orc.name, nodes: orc.dbNodeCount, cluster: orc.cluster, fingerprint },
          "composed database topology"
        );

        return {
          content: [
            {
              type: "text",
              text: `Composed ${orc.cluster ? "clustered" : "single-node"} database ${orc.name} (${orc.dbNodeCount} nodes)`
            }
          ],
          structuredContent: {
            fingerprint,
            topology: orc.toJSON(),
            batch_script: orc.batchSettings ? orc.batchScript() : null
          }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
