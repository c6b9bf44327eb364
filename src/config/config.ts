import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";

const zModulePath = z.string().min(1).nullable().default(null);

export const zComposerConfig = z.object({
  version: z.literal(1),
  database: z.object({
    exe: z.string().min(1),
    conf: z.string().min(1),
    ip_module: zModulePath,
    ai_module: zModulePath,
    default_port: z.number().int().min(1).max(65535).default(6379)
  })
});

export type ComposerConfigInput = z.input<typeof zComposerConfig>;
export type ComposerConfigData = z.output<typeof zComposerConfig>;

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;

  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

function expandEnv(value: unknown): unknown {
  if (typeof value === "string") return expandEnvToken(value);
  if (Array.isArray(value)) return value.map(expandEnv);
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnv(v);
    return out;
  }
  return value;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Resolved locations of the database server and its loadable modules.
 *
 * Composers receive an instance per topology and read from it when nodes are
 * built; nothing here is memoized across instances.
 */
export class ComposerConfig {
  private readonly data: ComposerConfigData;

  constructor(input: unknown, source = "inline config") {
    const parsed = zComposerConfig.safeParse(expandEnv(input));
    if (!parsed.success) {
      throw new ConfigurationError(`invalid config at ${source}: ${describeIssues(parsed.error)}`);
    }
    this.data = parsed.data;
  }

  static async loadFromFile(filePath: string): Promise<ComposerConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = YAML.parse(raw) as unknown;
    return new ComposerConfig(parsed, filePath);
  }

  databaseExe(): string {
    return this.data.database.exe;
  }

  databaseConf(): string {
    return this.data.database.conf;
  }

  ipModule(): string | null {
    return this.data.database.ip_module;
  }

  aiModule(): string | null {
    return this.data.database.ai_module;
  }

  defaultPort(): number {
    return this.data.database.default_port;
  }

  snapshot(): ComposerConfigData {
    return structuredClone(this.data);
  }
}
