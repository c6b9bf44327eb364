import { describe, it, expect } from "vitest";
import { ComposerConfig, Ensemble, PBSOrchestrator, RunSettings, fingerprintOf } from "../src/lib.js";

describe("package entry", () => {
  it("composes without starting the gateway", () => {
    const config = new ComposerConfig({ version: 1, database: { exe: "/opt/db/redis-server", conf: "/opt/db/redis.conf" } });
    const orc = new PBSOrchestrator({ config, batch: false });
    const ensemble = new Ensemble("lib", { h: [1, 2] }, { runSettings: new RunSettings("python") });

    expect(orc.names()).toEqual(["orchestrator_0"]);
    expect(ensemble.names()).toEqual(["lib_0", "lib_1"]);
    expect(ensemble.fingerprint()).toBe(fingerprintOf(ensemble.toJSON()));
  });
});
