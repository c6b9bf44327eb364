#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ComposerConfig } from "./config/config.js";
import { createLogger } from "./core/logger.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";

const logger = createLogger("main");

async function main(): Promise<void> {
  const configPath = process.env.ENSEMBLE_FABRIC_CONFIG ?? "config/default.config.yaml";
  const config = await ComposerConfig.loadFromFile(configPath);

  const server = createGatewayServer({ config, logger: createLogger("gateway") });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ configPath }, "ensemble-fabric gateway ready");
}

main().catch((err: unknown) => {
  logger.error({ err }, "gateway failed to start");
  process.exitCode = 1;
});
