/**
 * Pipeline configuration
 *
 * Fixed publishing identity plus environment overrides for everything
 * that differs between a local checkout and the CI runner.
 */

import cron from "node-cron";
import { z } from "zod";

export interface CommitIdentity {
  name: string;
  email: string;
}

export const COMMIT_IDENTITY: CommitIdentity = {
  name: "github-actions",
  email: "github-actions@github.com",
};

// [skip ci] stops the push from re-triggering the workflow
export const COMMIT_MESSAGE = "Update CSV and log [skip ci]";

export const DEFAULT_SCHEDULE = "0 5 * * *";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface PipelineConfig {
  schedule: string;
  nodeVersion: number;
  manifestPath: string;
  installCommand: string[];
  taskScript: string;
  outputDir: string;
  remote: string;
  branch: string;
  dbPath: string;
  identity: CommitIdentity;
  commitMessage: string;
}

const commandLine = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.split(/\s+/));

const envSchema = z.object({
  PIPELINE_SCHEDULE: z
    .string()
    .trim()
    .refine((value) => cron.validate(value), "invalid cron expression")
    .default(DEFAULT_SCHEDULE),
  PIPELINE_NODE_VERSION: z.coerce.number().int().positive().default(20),
  PIPELINE_MANIFEST: z.string().min(1).default("package.json"),
  PIPELINE_INSTALL_COMMAND: commandLine.default("npm install --no-audit --no-fund"),
  PIPELINE_TASK: z.string().min(1).default("src/scripts/fetch-prices.ts"),
  PIPELINE_DB_PATH: z.string().min(1).default("./data/energy_prices.db"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  GIT_REMOTE: z.string().min(1).default("origin"),
  GIT_BRANCH: z.string().min(1).default("main"),
});

/**
 * Build the pipeline configuration from environment variables
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid pipeline configuration:\n  ${issues.join("\n  ")}`);
  }

  const vars = parsed.data;
  return {
    schedule: vars.PIPELINE_SCHEDULE,
    nodeVersion: vars.PIPELINE_NODE_VERSION,
    manifestPath: vars.PIPELINE_MANIFEST,
    installCommand: vars.PIPELINE_INSTALL_COMMAND,
    taskScript: vars.PIPELINE_TASK,
    outputDir: vars.OUTPUT_DIR,
    remote: vars.GIT_REMOTE,
    branch: vars.GIT_BRANCH,
    dbPath: vars.PIPELINE_DB_PATH,
    identity: COMMIT_IDENTITY,
    commitMessage: COMMIT_MESSAGE,
  };
}
