import { RunSettings } from "./runSettings.js";
import { assertPositiveInt, normalizeHostList } from "./hostList.js";

/** Run settings for OpenMPI `mpirun`. Every option is written in its long `--opt value` form. */
export class MpirunSettings extends RunSettings {
  override get runCommand(): string {
    return "mpirun";
  }

  override setTasks(tasks: number): void {
    this.runArgs["n"] = assertPositiveInt("tasks", tasks);
  }

  override setTasksPerNode(tasksPerNode: number): void {
    this.runArgs["npernode"] = assertPositiveInt("tasks per node", tasksPerNode);
  }

  override setCpusPerTask(cpusPerTask: number): void {
    this.runArgs["cpus-per-proc"] = assertPositiveInt("cpus per task", cpusPerTask);
  }

  override setHostlist(hosts: string | string[]): void {
    this.runArgs["host"] = normalizeHostList(hosts).join(",");
  }

  override formatRunArgs(): string[] {
    const args: string[] = [];
    for (const [opt, value] of Object.entries(this.runArgs)) {
      if (value === null || value === "") args.push(`--${opt}`);
      else args.push(`--${opt}`, String(value));
    }
    return args;
  }

  override formatEnvVars(): string[] {
    return Object.entries(this.envVars).flatMap(([k, v]) => ["-x", `${k}=${v}`]);
  }

  override clone(): MpirunSettings {
    return new MpirunSettings(this.exe, this.cloneState());
  }
}
