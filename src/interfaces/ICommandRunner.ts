export interface CommandOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    // stream output to the parent's terminal instead of capturing it
    inheritStdio?: boolean;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface ICommandRunner {
    run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}
