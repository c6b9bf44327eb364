export class ComposerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ComposerError";
  }
}

export class ConfigurationError extends ComposerError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnsupportedCapabilityError extends ComposerError {
  readonly supported: readonly string[];

  constructor(message: string, supported: readonly string[]) {
    super(supported.length > 0 ? `${message} (supported: ${supported.join(", ")})` : message);
    this.name = "UnsupportedCapabilityError";
    this.supported = supported;
  }
}

export class StrategyContractError extends ComposerError {
  readonly strategyName: string;

  constructor(strategyName: string, detail: string) {
    super(`permutation strategy '${strategyName}' broke its contract: ${detail}`);
    this.name = "StrategyContractError";
    this.strategyName = strategyName;
  }
}

export class DuplicateEntityError extends ComposerError {
  readonly entityName: string;

  constructor(entityName: string, owner: string) {
    super(`entity ${entityName} already exists in ${owner}`);
    this.name = "DuplicateEntityError";
    this.entityName = entityName;
  }
}

export class TopologyConstraintError extends ComposerError {
  constructor(message: string) {
    super(message);
    this.name = "TopologyConstraintError";
  }
}
