import { DuplicateEntityError } from "../core/errors.js";
import type { SimEntity } from "./entity.js";

/**
 * Ordered group of entities addressed as one unit. Order is insertion order;
 * identity is the entity name, indexed separately from the sequence.
 */
export abstract class EntityList<T extends SimEntity> implements Iterable<T> {
  readonly name: string;
  path: string;
  private readonly members: T[] = [];
  private readonly index = new Map<string, T>();

  protected constructor(name: string, path: string) {
    if (!name.trim()) throw new TypeError(`${this.constructor.name} name must be non-empty`);
    this.name = name;
    this.path = path;
  }

  abstract get type(): string;

  get entities(): readonly T[] {
    return this.members;
  }

  get length(): number {
    return this.members.length;
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  get(name: string): T | undefined {
    return this.index.get(name);
  }

  names(): string[] {
    return this.members.map((e) => e.name);
  }

  setPath(path: string): void {
    this.path = path;
    for (const entity of this.members) entity.setPath(path);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.members[Symbol.iterator]();
  }

  protected addEntity(entity: T): void {
    if (this.index.has(entity.name)) throw new DuplicateEntityError(entity.name, `${this.type} ${this.name}`);
    this.index.set(entity.name, entity);
    this.members.push(entity);
  }
}
