import { ConfigurationError, StrategyContractError, UnsupportedCapabilityError } from "../core/errors.js";
import { assignParam, isParamScalar, type ParamAssignment, type ParamScalar } from "./parameterSpace.js";

export interface StrategyOptions {
  /** Number of assignments the random strategy draws. */
  count?: number;
  /** Uniform source in [0, 1); defaults to Math.random. */
  random?: () => number;
  [option: string]: unknown;
}

/**
 * A user strategy. Its return value is untrusted and validated the same way
 * as the built-ins'.
 */
export type StrategyFunction = (names: string[], values: ParamScalar[][], options: StrategyOptions) => unknown;

export const BUILTIN_STRATEGIES = ["all_perm", "step", "random"] as const;
export type BuiltinStrategyName = (typeof BUILTIN_STRATEGIES)[number];

export type PermutationStrategy =
  | { kind: "all_perm" }
  | { kind: "step" }
  | { kind: "random" }
  | { kind: "custom"; name: string; fn: StrategyFunction };

export type StrategyChoice = BuiltinStrategyName | StrategyFunction;

function zipAssignment(names: string[], row: Array<ParamScalar | undefined>): ParamAssignment {
  const assignment: ParamAssignment = {};
  names.forEach((name, i) => {
    const v = row[i];
    if (v !== undefined) assignParam(assignment, name, v);
  });
  return assignment;
}

/** Cartesian product; the last list varies fastest. */
export function createAllPermutations(names: string[], values: ParamScalar[][]): ParamAssignment[] {
  if (names.length === 0) return [];
  let rows: ParamScalar[][] = [[]];
  for (const list of values) {
    const next: ParamScalar[][] = [];
    for (const row of rows) {
      for (const v of list) next.push([...row, v]);
    }
    rows = next;
  }
  return rows.map((row) => zipAssignment(names, row));
}

/** Position-wise zip, truncated to the shortest list. */
export function stepValues(names: string[], values: ParamScalar[][]): ParamAssignment[] {
  if (values.length === 0) return [];
  const steps = Math.min(...values.map((list) => list.length));
  const out: ParamAssignment[] = [];
  for (let i = 0; i < steps; i++) {
    out.push(zipAssignment(names, values.map((list) => list[i])));
  }
  return out;
}

/** `options.count` independent draws, one value per list, with replacement. */
export function randomPermutations(
  names: string[],
  values: ParamScalar[][],
  options: StrategyOptions = {}
): ParamAssignment[] {
  const count = options.count;
  if (count === undefined) {
    throw new ConfigurationError("random permutation strategy requires a 'count' option");
  }
  if (!Number.isInteger(count) || count < 0) {
    throw new ConfigurationError(`random permutation strategy 'count' must be a non-negative integer (got ${count})`);
  }
  const random = options.random ?? Math.random;

  const out: ParamAssignment[] = [];
  for (let n = 0; n < count; n++) {
    const row = values.map((list) => {
      const idx = Math.min(list.length - 1, Math.floor(random() * list.length));
      return list[idx];
    });
    out.push(zipAssignment(names, row));
  }
  return out;
}

export function resolveStrategy(choice: string | StrategyFunction): PermutationStrategy {
  if (typeof choice === "function") {
    return { kind: "custom", name: choice.name || "<anonymous>", fn: choice };
  }
  if (choice === "all_perm" || choice === "step" || choice === "random") return { kind: choice };
  throw new UnsupportedCapabilityError(`permutation strategy is not supported: ${String(choice)}`, BUILTIN_STRATEGIES);
}

export function strategyName(strategy: PermutationStrategy): string {
  return strategy.kind === "custom" ? strategy.name : strategy.kind;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function validateAssignments(strategy: PermutationStrategy, names: string[], result: unknown): ParamAssignment[] {
  const name = strategyName(strategy);
  const known = new Set(names);
  if (!Array.isArray(result)) {
    throw new StrategyContractError(name, `expected a list of parameter assignments, got ${typeof result}`);
  }
  return result.map((entry: unknown, i) => {
    if (!isPlainObject(entry)) {
      throw new StrategyContractError(name, `assignment ${i} is not a mapping of parameter names to values`);
    }
    const assignment: ParamAssignment = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!known.has(key)) {
        throw new StrategyContractError(name, `assignment ${i} sets unknown parameter '${key}'`);
      }
      if (!isParamScalar(value)) {
        throw new StrategyContractError(name, `assignment ${i} maps '${key}' to a non-scalar value`);
      }
      assignParam(assignment, key, value);
    }
    const missing = names.filter((n) => !Object.prototype.hasOwnProperty.call(assignment, n));
    if (missing.length > 0) {
      throw new StrategyContractError(name, `assignment ${i} has no value for ${missing.map((n) => `'${n}'`).join(", ")}`);
    }
    return assignment;
  });
}

/** Run a strategy and check its output against the list-of-assignments contract. */
export function expandParameters(
  strategy: PermutationStrategy,
  names: string[],
  values: ParamScalar[][],
  options: StrategyOptions = {}
): ParamAssignment[] {
  let result: unknown;
  switch (strategy.kind) {
    case "all_perm":
      result = createAllPermutations(names, values);
      break;
    case "step":
      result = stepValues(names, values);
      break;
    case "random":
      result = randomPermutations(names, values, options);
      break;
    case "custom":
      result = strategy.fn(names, values, options);
      break;
  }
  return validateAssignments(strategy, names, result);
}
