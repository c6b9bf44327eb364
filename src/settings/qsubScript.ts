import path from "path";
import type { QsubBatchSettings } from "./batchSettings.js";

export interface QsubScriptStep {
  name: string;
  argv: string[];
}

function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\"'\"'`)}'`;
}

function assertJobName(name: string): string {
  // PBS job names: up to 236 printable chars, no whitespace, must start with a letter.
  const trimmed = name.trim().slice(0, 236);
  if (!/^[A-Za-z][^\s]*$/.test(trimmed)) throw new TypeError(`invalid PBS job name: ${name}`);
  return trimmed;
}

/**
 * Render a `#PBS` batch script that starts every step in the background on
 * the allocation and waits for all of them. Submission is left to the caller.
 */
export function renderQsubScript(input: {
  jobName: string;
  workDir: string;
  batch: QsubBatchSettings;
  steps: QsubScriptStep[];
}): string {
  const workDir = path.resolve(input.workDir);
  const jobName = assertJobName(input.jobName);
  if (input.steps.length < 1) throw new TypeError("batch script needs at least one step");

  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push(`#PBS -N ${jobName}`);
  for (const opt of input.batch.formatBatchArgs()) lines.push(`#PBS ${opt}`);
  lines.push(`#PBS -o ${path.join(workDir, `${jobName}.out`)}`);
  lines.push(`#PBS -e ${path.join(workDir, `${jobName}.err`)}`);
  lines.push("");
  lines.push("set -euo pipefail");
  lines.push(`cd ${bashSingleQuote(workDir)}`);
  lines.push("");

  for (const step of input.steps) {
    if (step.argv.length < 1) throw new TypeError(`step ${step.name} has an empty command`);
    const cmdLine = step.argv.map((p) => bashSingleQuote(p)).join(" ");
    lines.push(`# ${step.name}`);
    lines.push(`${cmdLine} >${bashSingleQuote(path.join(workDir, `${step.name}.out`))} 2>&1 &`);
  }
  lines.push("");
  lines.push("wait");
  lines.push("");

  return lines.join("\n");
}
