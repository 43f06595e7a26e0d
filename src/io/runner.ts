import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandExecutionError } from '../errors.js';
import type { Spinner } from '../cli/ui/spinner.js';

const execFileAsync = promisify(execFile);

/**
 * Runs a fully resolved command and hands back its standard output
 */
export interface CommandRunner {
    run(command: string): Promise<string>;
}

export interface ShellRunnerOptions {
    /** Interpreter invoked as `<shell> -c <command>` (default: /bin/sh) */
    shell?: string;
    /** Working directory for the command */
    cwd?: string;
    /** Shown on stderr while the command runs */
    spinner?: Pick<Spinner, 'start' | 'stop'>;
}

/**
 * Shell Command Runner — executes commands through a command interpreter
 *
 * Waits for the command to finish, however long it takes. Standard error is
 * discarded and the exit status is ignored: whatever the command wrote to
 * stdout is returned. Only a failure to run the interpreter itself rejects.
 */
export class ShellCommandRunner implements CommandRunner {
    private shell: string;

    constructor(private options: ShellRunnerOptions = {}) {
        this.shell = options.shell ?? '/bin/sh';
    }

    async run(command: string): Promise<string> {
        const { spinner } = this.options;
        spinner?.start('Running...');

        try {
            const { stdout } = await execFileAsync(this.shell, ['-c', command], {
                cwd: this.options.cwd,
                maxBuffer: Infinity,
            });
            return stdout;
        } catch (err) {
            const error = err as { code?: string | number | null; stdout?: string; message?: string };

            // Numeric code: the command ran and exited non-zero. Null: killed by a signal.
            if (typeof error.code !== 'string') {
                return error.stdout ?? '';
            }
            throw new CommandExecutionError(error.message ?? `${this.shell} could not be started`, command);
        } finally {
            spinner?.stop();
        }
    }
}
