import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner shown on stderr while a command runs.
 *
 * ora stays silent when stderr is not a TTY, so a session carried over a
 * pipe or socket never sees its control sequences.
 */
export class Spinner {
    private spinner: Ora;

    constructor(stream: NodeJS.WriteStream = process.stderr) {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
            stream,
            discardStdin: false,
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(message));
    }

    stop(): void {
        this.spinner.stop();
    }
}
