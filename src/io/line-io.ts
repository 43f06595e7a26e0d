import { createInterface, type Interface } from 'node:readline';

/**
 * Line transport between the navigator and the user.
 *
 * Everything the user sees is whole lines; everything read is one line.
 */
export interface LineIO {
    /** Write one line (a newline is appended) */
    print(line?: string): void;
    /** Write text exactly as given */
    write(text: string): void;
    /** Show `prompt` and wait for the next line; null once input has ended */
    readLine(prompt: string): Promise<string | null>;
}

/**
 * readline-backed transport over stdin/stdout
 *
 * Lines are queued as they arrive, so input piped in ahead of the prompts
 * (a node forwarding a whole buffer at once) is never dropped.
 */
export class ReadlineIO implements LineIO {
    private rl: Interface;
    private pending: string[] = [];
    private waiting: ((line: string | null) => void) | null = null;
    private ended = false;

    constructor(
        private input: NodeJS.ReadableStream = process.stdin,
        private output: NodeJS.WritableStream = process.stdout,
    ) {
        this.rl = createInterface({ input, terminal: false });

        this.rl.on('line', (line) => {
            if (this.waiting) {
                const resolve = this.waiting;
                this.waiting = null;
                resolve(line);
            } else {
                this.pending.push(line);
            }
        });

        this.rl.on('close', () => {
            this.ended = true;
            if (this.waiting) {
                const resolve = this.waiting;
                this.waiting = null;
                resolve(null);
            }
        });
    }

    print(line = ''): void {
        this.output.write(`${line}\n`);
    }

    write(text: string): void {
        this.output.write(text);
    }

    readLine(prompt: string): Promise<string | null> {
        this.output.write(prompt);

        const next = this.pending.shift();
        if (next !== undefined) return Promise.resolve(next);
        if (this.ended) return Promise.resolve(null);

        // Something else (a spinner, a child process) may have paused the stream
        this.input.resume();
        return new Promise((resolve) => {
            this.waiting = resolve;
        });
    }

    close(): void {
        this.rl.close();
    }
}
