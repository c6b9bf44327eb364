import { RunSettings } from "./runSettings.js";
import { assertPositiveInt, normalizeHostList } from "./hostList.js";

/** Run settings for Cray ALPS `aprun`. */
export class AprunSettings extends RunSettings {
  override get runCommand(): string {
    return "aprun";
  }

  override setTasks(tasks: number): void {
    this.runArgs["pes"] = assertPositiveInt("tasks", tasks);
  }

  override setTasksPerNode(tasksPerNode: number): void {
    this.runArgs["pes-per-node"] = assertPositiveInt("tasks per node", tasksPerNode);
  }

  override setCpusPerTask(cpusPerTask: number): void {
    this.runArgs["cpus-per-pe"] = assertPositiveInt("cpus per task", cpusPerTask);
  }

  override setHostlist(hosts: string | string[]): void {
    this.runArgs["node-list"] = normalizeHostList(hosts).join(",");
  }

  override formatRunArgs(): string[] {
    const args: string[] = [];
    for (const [opt, value] of Object.entries(this.runArgs)) {
      const short = opt.length === 1;
      if (value === null || value === "") {
        args.push(short ? `-${opt}` : `--${opt}`);
      } else if (short) {
        args.push(`-${opt}`, String(value));
      } else {
        args.push(`--${opt}=${value}`);
      }
    }
    return args;
  }

  override formatEnvVars(): string[] {
    return Object.entries(this.envVars).flatMap(([k, v]) => ["-e", `${k}=${v}`]);
  }

  override clone(): AprunSettings {
    return new AprunSettings(this.exe, this.cloneState());
  }
}
