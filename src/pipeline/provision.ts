/**
 * Environment provisioner: check the runtime, then install dependencies
 * from the manifest.
 */

import { existsSync } from "fs";
import { resolve } from "path";
import type { CommandResult, ICommandRunner } from "../interfaces/ICommandRunner";
import { describeError, ProvisionError } from "./errors";

export interface ProvisionOptions {
  cwd: string;
  nodeVersion: number;
  manifestPath: string;
  // overridable for tests
  runtimeVersion?: string;
}

export function majorVersion(version: string): number {
  return Number.parseInt(version.replace(/^v/, "").split(".")[0] ?? "", 10);
}

/**
 * Verify the interpreter and the manifest. Returns the manifest's absolute path.
 */
export function provisionEnvironment(options: ProvisionOptions): string {
  const runtime = options.runtimeVersion ?? process.versions.node;
  const major = majorVersion(runtime);
  if (major !== options.nodeVersion) {
    throw new ProvisionError("provision", `Node.js ${options.nodeVersion} required, running ${runtime}`);
  }

  const manifest = resolve(options.cwd, options.manifestPath);
  if (!existsSync(manifest)) {
    throw new ProvisionError("provision", `Dependency manifest not found: ${manifest}`);
  }

  console.log(`  ✓ Node.js ${runtime}, manifest ${options.manifestPath}`);
  return manifest;
}

/**
 * Run the install command. Any failure is fatal.
 */
export async function installDependencies(
  runner: ICommandRunner,
  cwd: string,
  installCommand: readonly string[]
): Promise<void> {
  const [command, ...args] = installCommand;
  if (!command) {
    throw new ProvisionError("install", "Install command is empty");
  }

  console.log(`  $ ${installCommand.join(" ")}`);
  let result: CommandResult;
  try {
    result = await runner.run(command, args, { cwd, inheritStdio: true });
  } catch (error) {
    throw new ProvisionError("install", `Could not start "${command}": ${describeError(error)}`, { cause: error });
  }

  if (result.exitCode !== 0) {
    throw new ProvisionError("install", `Dependency install exited with code ${result.exitCode}`);
  }
}
