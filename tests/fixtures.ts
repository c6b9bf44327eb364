import { ComposerConfig } from "../src/config/config.js";

export function testConfig(modules: { ai?: string; ip?: string } = {}): ComposerConfig {
  return new ComposerConfig({
    version: 1,
    database: {
      exe: "/opt/db/redis-server",
      conf: "/opt/db/redis.conf",
      ip_module: modules.ip ?? null,
      ai_module: modules.ai ?? null
    }
  });
}
