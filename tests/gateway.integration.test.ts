import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema, McpError } from "@modelcontextprotocol/sdk/types.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import { zEnsembleComposeOutput, zOrchestratorComposeOutput } from "../src/mcp/toolSchemas.js";
import { testConfig } from "./fixtures.js";

describe.sequential("gateway (in-memory)", () => {
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function callTool(name: string, args: Record<string, unknown>) {
    return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  }

  function textOf(result: { content: Array<{ type: string; text?: string }> }): string {
    return result.content.map((c) => (c.type === "text" ? c.text ?? "" : c.type)).join("\n");
  }

  // Tool failures surface either as an error result or as a protocol error, depending on the SDK path.
  async function callToolError(name: string, args: Record<string, unknown>): Promise<string> {
    try {
      const result = await callTool(name, args);
      expect(result.isError).toBe(true);
      return textOf(result);
    } catch (e) {
      if (e instanceof McpError) return e.message;
      throw e;
    }
  }

  beforeAll(async () => {
    const server = createGatewayServer({ config: testConfig() });
    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "ensemble-fabric-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
  });

  it("lists tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    const names = new Set(result.tools.map((t) => t.name));
    expect(names.has("ensemble_compose")).toBe(true);
    expect(names.has("orchestrator_compose")).toBe(true);
  });

  it("composes a stepped ensemble", async () => {
    const result = await callTool("ensemble_compose", {
      name: "exp",
      params: { h: [5, 6], g: [7, 8] },
      run_settings: { exe: "python", exe_args: ["model.py"] },
      perm_strategy: "step",
      path: "/work/exp"
    });
    if (result.isError) throw new Error(`ensemble_compose failed: ${textOf(result)}`);

    const sc = zEnsembleComposeOutput.parse(result.structuredContent);
    expect(sc.fingerprint).toMatch(/^sha256:[a-f0-9]{64}$/);
    expect(sc.ensemble.strategy).toBe("step");
    expect(sc.ensemble.models.map((m) => m.name)).toEqual(["exp_0", "exp_1"]);
    expect(sc.ensemble.models.map((m) => m.params)).toEqual([
      { h: 5, g: 7 },
      { h: 6, g: 8 }
    ]);
    const [first] = sc.ensemble.models;
    expect(first?.key_prefixing).toBe(true);
    expect(first?.launch_command).toEqual(["python", "model.py"]);
    expect(textOf(result)).toBe("Composed ensemble exp with 2 members");
  });

  it("reports ensembles that need run settings", async () => {
    const message = await callToolError("ensemble_compose", { name: "exp", params: { h: [1, 2] } });
    expect(message).toContain("ensembles supplied with 'params' must be provided run settings");
  });

  it("composes a clustered batch topology with a qsub script", async () => {
    const result = await callTool("orchestrator_compose", {
      name: "db",
      port: 6780,
      db_nodes: 3,
      batch: true,
      hosts: ["n1", "n2", "n3"],
      account: "proj01",
      cpus: 2,
      path: "/scratch/db"
    });
    if (result.isError) throw new Error(`orchestrator_compose failed: ${textOf(result)}`);

    const sc = zOrchestratorComposeOutput.parse(result.structuredContent);
    expect(sc.topology.cluster).toBe(true);
    expect(sc.topology.ports).toEqual([6780]);
    expect(sc.topology.nodes.map((n) => n.host)).toEqual(["n1", "n2", "n3"]);
    expect(sc.topology.nodes[0]?.run_settings.run_args).toEqual({ pes: 1, "pes-per-node": 1, "cpus-per-pe": 2 });
    expect(sc.topology.batch_settings?.["formatted"]).toEqual([
      "-l select=3:ncpus=2:host=n1+host=n2+host=n3",
      "-l place=scatter",
      "-A proj01"
    ]);
    expect(sc.batch_script?.split("\n").slice(0, 2)).toEqual(["#!/usr/bin/env bash", "#PBS -N db"]);
    expect(textOf(result)).toBe("Composed clustered database db (3 nodes)");
  });

  it("composes an interactive topology without a batch script", async () => {
    const result = await callTool("orchestrator_compose", { db_nodes: 1, batch: false, port: 6379 });
    if (result.isError) throw new Error(`orchestrator_compose failed: ${textOf(result)}`);

    const sc = zOrchestratorComposeOutput.parse(result.structuredContent);
    expect(sc.topology.cluster).toBe(false);
    expect(sc.topology.batch_settings).toBeNull();
    expect(sc.batch_script).toBeNull();
  });

  it("rejects two-node topologies", async () => {
    const message = await callToolError("orchestrator_compose", { db_nodes: 2, batch: false });
    expect(message).toContain("PBSOrchestrator does not support clusters of size 2");
  });

  it("lists supported launchers for unknown run commands", async () => {
    const message = await callToolError("orchestrator_compose", { run_command: "srun", batch: false });
    expect(message).toContain("(supported: aprun, mpirun)");
  });
});
