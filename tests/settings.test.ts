import { describe, it, expect } from "vitest";
import { ConfigurationError, UnsupportedCapabilityError } from "../src/core/errors.js";
import { AprunSettings } from "../src/settings/aprunSettings.js";
import { QsubBatchSettings } from "../src/settings/batchSettings.js";
import { MpirunSettings } from "../src/settings/mpirunSettings.js";
import { renderQsubScript } from "../src/settings/qsubScript.js";
import { RunSettings } from "../src/settings/runSettings.js";

describe("RunSettings", () => {
  it("runs the executable directly and splits string arguments", () => {
    const rs = new RunSettings("python", { exeArgs: "train.py  --epochs 3" });
    expect(rs.runCommand).toBeNull();
    expect(rs.launchCommand()).toEqual(["python", "train.py", "--epochs", "3"]);
  });

  it("cannot express launcher-specific placement", () => {
    const rs = new RunSettings("python");
    expect(() => rs.setTasks(2)).toThrow(UnsupportedCapabilityError);
    expect(() => rs.setHostlist(["n1"])).toThrow("run settings for direct execution cannot set a host list");
  });

  it("clones into an independent value of the same class", () => {
    const original = new MpirunSettings("app", { exeArgs: ["-v"], envVars: { OMP_NUM_THREADS: "4" } });
    const copy = original.clone();
    copy.setTasks(8);
    copy.envVars["EXTRA"] = "1";
    copy.addExeArgs(["--more"]);

    expect(copy).toBeInstanceOf(MpirunSettings);
    expect(original.runArgs).toEqual({});
    expect(original.envVars).toEqual({ OMP_NUM_THREADS: "4" });
    expect(original.exeArgs).toEqual(["-v"]);
  });
});

describe("AprunSettings", () => {
  it("formats short and long options and env vars", () => {
    const rs = new AprunSettings("srv", { runArgs: { d: 2, cc: null }, envVars: { A: "1" } });
    rs.setTasks(4);
    rs.setHostlist(["n1", "n2"]);
    expect(rs.launchCommand()).toEqual(["aprun", "-e", "A=1", "-d", "2", "--cc", "--pes=4", "--node-list=n1,n2", "srv"]);
  });

  it("rejects non-positive task counts", () => {
    const rs = new AprunSettings("srv");
    expect(() => rs.setTasks(0)).toThrow(TypeError);
    expect(() => rs.setCpusPerTask(1.5)).toThrow(TypeError);
  });
});

describe("MpirunSettings", () => {
  it("writes every option in long form", () => {
    const rs = new MpirunSettings("srv", { runArgs: { "bind-to": "none", oversubscribe: null }, envVars: { X: "y" } });
    rs.setCpusPerTask(2);
    expect(rs.launchCommand()).toEqual([
      "mpirun",
      "-x",
      "X=y",
      "--bind-to",
      "none",
      "--oversubscribe",
      "--cpus-per-proc",
      "2",
      "srv"
    ]);
  });
});

describe("QsubBatchSettings", () => {
  it("formats select, placement, walltime, extra resources and batch args", () => {
    const batch = new QsubBatchSettings({ nodes: 2, ncpus: 8, time: "02:00:00", queue: "workq" });
    batch.setHostlist(["h1", "h2"]);
    batch.setResource("mem", "16gb");
    batch.setBatchArg("V");
    expect(batch.formatBatchArgs()).toEqual([
      "-l select=2:ncpus=8:host=h1+host=h2",
      "-l place=scatter",
      "-l walltime=02:00:00",
      "-l mem=16gb",
      "-q workq",
      "-V"
    ]);
  });

  it("prefers explicit select and place resources", () => {
    const batch = new QsubBatchSettings({ resources: { select: "1:ncpus=36", place: "excl" } });
    expect(batch.formatBatchArgs()).toEqual(["-l select=1:ncpus=36", "-l place=excl"]);
  });

  it("needs nodes or a select statement", () => {
    expect(() => new QsubBatchSettings().formatBatchArgs()).toThrow(ConfigurationError);
  });

  it("reserves the output and error options", () => {
    const batch = new QsubBatchSettings({ nodes: 1 });
    expect(() => batch.setBatchArg("o", "/tmp/out")).toThrow(ConfigurationError);
    expect(() => batch.setBatchArg("e", "/tmp/err")).toThrow(ConfigurationError);
  });

  it("clones hosts and tables independently", () => {
    const batch = new QsubBatchSettings({ nodes: 1, account: "acct" });
    batch.setHostlist("h1");
    const copy = batch.clone();
    copy.setHostlist(["h9"]);
    copy.setBatchArg("m", "e");
    expect(batch.hosts).toEqual(["h1"]);
    expect(batch.batchArgs).toEqual({ A: "acct" });
    expect(copy.batchArgs).toEqual({ A: "acct", m: "e" });
  });
});

describe("renderQsubScript", () => {
  it("quotes arguments and waits for every step", () => {
    const script = renderQsubScript({
      jobName: "ens",
      workDir: "/scratch/run",
      batch: new QsubBatchSettings({ nodes: 1 }),
      steps: [
        { name: "ens_0", argv: ["python", "it's.py"] },
        { name: "ens_1", argv: ["python", "b.py"] }
      ]
    });
    const lines = script.split("\n");
    expect(lines).toContain(`'python' 'it'"'"'s.py' >'/scratch/run/ens_0.out' 2>&1 &`);
    expect(lines).toContain(`'python' 'b.py' >'/scratch/run/ens_1.out' 2>&1 &`);
    expect(lines.slice(-2)).toEqual(["wait", ""]);
  });

  it("rejects job names PBS would refuse", () => {
    expect(() =>
      renderQsubScript({
        jobName: "1 bad",
        workDir: "/tmp",
        batch: new QsubBatchSettings({ nodes: 1 }),
        steps: [{ name: "s", argv: ["true"] }]
      })
    ).toThrow(TypeError);
  });
});
