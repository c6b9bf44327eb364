import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";

export const zParamScalar = z.union([z.string(), z.number().finite()]);
export const zParamValues = z.union([zParamScalar, z.array(zParamScalar)]);

export type ParamScalar = z.infer<typeof zParamScalar>;
export type ParamAssignment = Record<string, ParamScalar>;
export type ParameterInput = Record<string, ParamScalar | ParamScalar[]>;

export interface ParameterSpace {
  names: string[];
  values: ParamScalar[][];
}

export function isParamScalar(value: unknown): value is ParamScalar {
  return zParamScalar.safeParse(value).success;
}

/** Define `name` as an own key, so names such as `__proto__` survive. */
export function assignParam(assignment: ParamAssignment, name: string, value: ParamScalar): void {
  Object.defineProperty(assignment, name, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Split a raw parameter map into parallel name and value-list arrays, in the
 * map's iteration order. Scalars become one-element lists.
 */
export function readParameterSpace(params: Record<string, unknown>): ParameterSpace {
  const names: string[] = [];
  const values: ParamScalar[][] = [];

  for (const [name, raw] of Object.entries(params)) {
    const parsed = zParamValues.safeParse(raw);
    if (!parsed.success) {
      throw new TypeError(`incorrect type for ensemble parameter '${name}': must be a string, number, or list of those`);
    }
    const list = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    if (list.length === 0) {
      throw new ConfigurationError(`ensemble parameter '${name}' has no values`);
    }
    names.push(name);
    values.push(list);
  }

  return { names, values };
}
