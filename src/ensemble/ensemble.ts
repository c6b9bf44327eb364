import { fingerprintOf, type Fingerprint } from "../core/canonicalJson.js";
import { ConfigurationError } from "../core/errors.js";
import { entityName } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { createLogger } from "../core/logger.js";
import type { SimEntity } from "../entity/entity.js";
import { EntityList } from "../entity/entityList.js";
import { Model, type IncomingEntity } from "../entity/model.js";
import type { BatchSettings } from "../settings/batchSettings.js";
import type { RunSettings } from "../settings/runSettings.js";
import { readParameterSpace, type ParamAssignment } from "./parameterSpace.js";
import {
  expandParameters,
  resolveStrategy,
  strategyName,
  type PermutationStrategy,
  type StrategyChoice,
  type StrategyOptions
} from "./strategies.js";

const logger = createLogger("ensemble");

export interface EnsembleOptions {
  /** Template copied into every member. Required when `params` is non-empty. */
  runSettings?: RunSettings | null;
  /** Present when the whole ensemble is submitted as one batch job. */
  batchSettings?: BatchSettings | null;
  /** A built-in name or a user function; unknown names are rejected with the supported list. */
  permStrategy?: StrategyChoice | string;
  /** Number of identical members to create when there are no params. */
  replicas?: number | null;
  strategyOptions?: StrategyOptions;
  path?: string;
}

/**
 * A group of `Model` members expanded from a parameter space (or replicated
 * from one run settings template) and addressed as a single unit.
 *
 * Members are named `<ensemble>_<i>` in expansion order and each gets its own
 * copy of the run settings, so tuning one member never leaks into another.
 */
export class Ensemble extends EntityList<Model> {
  readonly params: Record<string, unknown>;
  readonly runSettings: RunSettings | null;
  readonly batchSettings: BatchSettings | null;
  readonly strategy: PermutationStrategy;

  constructor(name: string, params: Record<string, unknown> = {}, options: EnsembleOptions = {}) {
    super(name, options.path ?? process.cwd());
    this.params = { ...params };
    this.runSettings = options.runSettings ?? null;
    this.batchSettings = options.batchSettings ?? null;
    this.strategy = resolveStrategy(options.permStrategy ?? "all_perm");
    this.initializeModels(options.replicas ?? null, options.strategyOptions ?? {});
  }

  get type(): string {
    return "Ensemble";
  }

  get models(): readonly Model[] {
    return this.entities;
  }

  addModel(model: SimEntity): void {
    if (!(model instanceof Model)) {
      throw new TypeError(`argument to addModel was a ${model.type}, not a Model`);
    }
    this.addEntity(model);
  }

  enableKeyPrefixing(): void {
    for (const model of this) model.enableKeyPrefixing();
  }

  queryKeyPrefixing(): boolean {
    return this.models.every((model) => model.queryKeyPrefixing());
  }

  registerIncomingEntity(peer: IncomingEntity): void {
    for (const model of this) model.registerIncomingEntity(peer);
  }

  toJSON(): JsonObject {
    return {
      name: this.name,
      type: this.type,
      path: this.path,
      strategy: strategyName(this.strategy),
      batch_settings: this.batchSettings ? this.batchSettings.toJSON() : null,
      models: this.models.map((m) => m.toJSON())
    };
  }

  fingerprint(): Fingerprint {
    return fingerprintOf(this.toJSON());
  }

  private initializeModels(replicas: number | null, strategyOptions: StrategyOptions): void {
    const hasParams = Object.keys(this.params).length > 0;
    const template = this.runSettings;

    if (hasParams) {
      if (!template) {
        throw new ConfigurationError("ensembles supplied with 'params' must be provided run settings");
      }
      const { names, values } = readParameterSpace(this.params);
      const assignments = expandParameters(this.strategy, names, values, strategyOptions);
      assignments.forEach((assignment, i) => this.createMember(i, assignment, template));
      return;
    }

    if (template) {
      if (replicas === null || replicas === 0) {
        throw new ConfigurationError(
          "ensembles without 'params' or 'replicas' to expand into members cannot be given run settings"
        );
      }
      if (!Number.isInteger(replicas) || replicas < 0) {
        throw new TypeError(`replicas must be a positive integer (got ${replicas})`);
      }
      for (let i = 0; i < replicas; i++) this.createMember(i, {}, template);
      return;
    }

    if (!this.batchSettings) {
      throw new ConfigurationError("ensemble must be provided batch settings or run settings");
    }
    logger.info({ ensemble: this.name }, "empty ensemble created for batch launch");
  }

  private createMember(index: number, params: ParamAssignment, template: RunSettings): void {
    const model = new Model(entityName(this.name, index), params, this.path, template.clone());
    model.enableKeyPrefixing();
    this.addEntity(model);
    logger.debug({ ensemble: this.name, model: model.name, params }, "created ensemble member");
  }
}
