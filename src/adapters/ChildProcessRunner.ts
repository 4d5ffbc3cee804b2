import { spawn } from 'child_process';
import type { CommandOptions, CommandResult, ICommandRunner } from '../interfaces/ICommandRunner';

export class ChildProcessRunner implements ICommandRunner {
    async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
        return new Promise((resolve, reject) => {
            const child = spawn(command, args, {
                cwd: options.cwd,
                env: options.env ?? process.env,
                stdio: options.inheritStdio ? 'inherit' : 'pipe',
            });

            let stdout = '';
            let stderr = '';
            child.stdout?.on('data', (chunk: Buffer) => {
                stdout += chunk.toString();
            });
            child.stderr?.on('data', (chunk: Buffer) => {
                stderr += chunk.toString();
            });

            child.on('error', (err) => {
                reject(err);
            });

            child.on('close', (code, signal) => {
                // killed by a signal: report as a failure with the signal name
                if (code === null) {
                    resolve({ exitCode: 128, stdout, stderr: stderr || `terminated by ${signal ?? 'unknown signal'}` });
                    return;
                }
                resolve({ exitCode: code, stdout, stderr });
            });
        });
    }
}
