import type { JsonObject } from "../core/json.js";
import type { RunSettings } from "../settings/runSettings.js";
import type { ParamAssignment } from "../ensemble/parameterSpace.js";
import { SimEntity } from "./entity.js";

export interface IncomingEntity {
  readonly name: string;
}

export class Model extends SimEntity {
  readonly params: ParamAssignment;
  private keyPrefixing = false;
  private readonly incoming = new Set<string>();

  constructor(name: string, params: ParamAssignment, path: string, runSettings: RunSettings) {
    super(name, path, runSettings);
    this.params = { ...params };
  }

  get type(): string {
    return "Model";
  }

  /** Namespace this model's keys in the shared store by its own name. */
  enableKeyPrefixing(): void {
    this.keyPrefixing = true;
  }

  disableKeyPrefixing(): void {
    this.keyPrefixing = false;
  }

  queryKeyPrefixing(): boolean {
    return this.keyPrefixing;
  }

  /** Record an entity whose prefixed keys this model will read. */
  registerIncomingEntity(peer: IncomingEntity): void {
    this.incoming.add(peer.name);
  }

  incomingEntities(): string[] {
    return [...this.incoming];
  }

  override toJSON(): JsonObject {
    return {
      ...super.toJSON(),
      params: { ...this.params },
      key_prefixing: this.keyPrefixing,
      incoming_entities: this.incomingEntities()
    };
  }
}
