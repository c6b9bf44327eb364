export * from "./core/errors.js";
export { fingerprintOf, stableJsonStringify, type Fingerprint } from "./core/canonicalJson.js";
export { createLogger, type Logger } from "./core/logger.js";
export { ComposerConfig, zComposerConfig, type ComposerConfigData, type ComposerConfigInput } from "./config/config.js";
export { RunSettings, type RunArgValue, type RunSettingsInit } from "./settings/runSettings.js";
export { AprunSettings } from "./settings/aprunSettings.js";
export { MpirunSettings } from "./settings/mpirunSettings.js";
export { BatchSettings, QsubBatchSettings, type BatchArgValue, type QsubBatchInit } from "./settings/batchSettings.js";
export { renderQsubScript } from "./settings/qsubScript.js";
export { SimEntity } from "./entity/entity.js";
export { Model, type IncomingEntity } from "./entity/model.js";
export { DBNode } from "./entity/dbNode.js";
export { EntityList } from "./entity/entityList.js";
export {
  readParameterSpace,
  type ParamAssignment,
  type ParamScalar,
  type ParameterInput,
  type ParameterSpace
} from "./ensemble/parameterSpace.js";
export {
  BUILTIN_STRATEGIES,
  createAllPermutations,
  expandParameters,
  randomPermutations,
  resolveStrategy,
  stepValues,
  strategyName,
  type PermutationStrategy,
  type StrategyChoice,
  type StrategyFunction,
  type StrategyOptions
} from "./ensemble/strategies.js";
export { Ensemble, type EnsembleOptions } from "./ensemble/ensemble.js";
export { Orchestrator, MIN_CLUSTER_NODES, type OrchestratorOptions } from "./database/orchestrator.js";
export { PBSOrchestrator, type PBSOrchestratorOptions } from "./database/pbsOrchestrator.js";
export { RUN_COMMAND_FAMILIES, SUPPORTED_RUN_COMMANDS, lookupRunCommand, type RunCommand } from "./database/runCommands.js";
export { createGatewayServer, type GatewayDeps } from "./mcp/gatewayServer.js";
