import { UnsupportedCapabilityError } from "../core/errors.js";
import { AprunSettings } from "../settings/aprunSettings.js";
import { MpirunSettings } from "../settings/mpirunSettings.js";
import type { RunArgValue, RunSettings } from "../settings/runSettings.js";

export type RunCommand = "aprun" | "mpirun";

export const SUPPORTED_RUN_COMMANDS: readonly RunCommand[] = ["aprun", "mpirun"];

export interface RunCommandFamily {
  runCommand: RunCommand;
  /** Build one database node's settings: one task, one task per node. */
  buildSettings(exe: string, exeArgs: string[], runArgs: Record<string, RunArgValue>): RunSettings;
  /** The launcher cannot discover placement on its own and needs explicit hosts. */
  requiresHosts: boolean;
  /**
   * Whether node host lists go into the run settings while the topology is
   * submitted as a batch job. aprun rejects explicit node lists inside a qsub
   * job, so placement is left to the batch select statement.
   */
  hostlistInBatch: boolean;
}

export const RUN_COMMAND_FAMILIES = {
  aprun: {
    runCommand: "aprun",
    buildSettings(exe, exeArgs, runArgs) {
      const settings = new AprunSettings(exe, { exeArgs, runArgs });
      settings.setTasks(1);
      settings.setTasksPerNode(1);
      return settings;
    },
    requiresHosts: false,
    hostlistInBatch: false
  },
  mpirun: {
    runCommand: "mpirun",
    buildSettings(exe, exeArgs, runArgs) {
      const settings = new MpirunSettings(exe, { exeArgs, runArgs });
      settings.setTasks(1);
      settings.setTasksPerNode(1);
      return settings;
    },
    requiresHosts: true,
    hostlistInBatch: true
  }
} satisfies Record<RunCommand, RunCommandFamily>;

export function isRunCommand(value: string): value is RunCommand {
  return SUPPORTED_RUN_COMMANDS.some((c) => c === value);
}

export function lookupRunCommand(value: string, owner: string): RunCommandFamily {
  if (!isRunCommand(value)) {
    throw new UnsupportedCapabilityError(`${owner} does not support ${value} as a launch binary`, SUPPORTED_RUN_COMMANDS);
  }
  return RUN_COMMAND_FAMILIES[value];
}
