/**
 * Task executor: runs the task script with the provisioned interpreter
 */

import type { CommandResult, ICommandRunner } from "../interfaces/ICommandRunner";
import { describeError, ExecutionError } from "./errors";

export interface TaskOptions {
  cwd: string;
  script: string;
  // defaults to the running Node.js binary
  interpreter?: string;
}

/**
 * Build the command line: the interpreter with the tsx loader and the script, no arguments
 */
export function taskCommand(options: TaskOptions): [string, string[]] {
  return [options.interpreter ?? process.execPath, ["--import", "tsx", options.script]];
}

export async function executeTask(runner: ICommandRunner, options: TaskOptions): Promise<void> {
  const [command, args] = taskCommand(options);
  console.log(`  $ ${options.script}`);

  let result: CommandResult;
  try {
    result = await runner.run(command, args, { cwd: options.cwd, inheritStdio: true });
  } catch (error) {
    throw new ExecutionError(null, `Could not start task ${options.script}: ${describeError(error)}`, { cause: error });
  }

  if (result.exitCode !== 0) {
    throw new ExecutionError(result.exitCode, `Task ${options.script} exited with code ${result.exitCode}`);
  }
}
