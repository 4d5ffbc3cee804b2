/**
 * Pipeline step failures. Every one is fatal to the run.
 */

export type StepName = "provision" | "install" | "execute" | "publish";

export class PipelineError extends Error {
  constructor(public readonly step: StepName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export class ProvisionError extends PipelineError {
  constructor(step: "provision" | "install", message: string, options?: { cause?: unknown }) {
    super(step, message, options);
    this.name = "ProvisionError";
  }
}

export class ExecutionError extends PipelineError {
  constructor(public readonly exitCode: number | null, message: string, options?: { cause?: unknown }) {
    super("execute", message, options);
    this.name = "ExecutionError";
  }
}

export class PublishError extends PipelineError {
  constructor(message: string, public readonly stderr: string = "", options?: { cause?: unknown }) {
    super("publish", message, options);
    this.name = "PublishError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
