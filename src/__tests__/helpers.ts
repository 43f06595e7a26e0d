import type { CommandRunner } from '../io/runner.js';
import type { LineIO } from '../io/line-io.js';

/**
 * Line transport fed from a fixed script; records everything printed
 */
export class ScriptedIO implements LineIO {
    readonly output: string[] = [];
    readonly prompts: string[] = [];
    private script: string[];

    constructor(lines: string[] = []) {
        this.script = [...lines];
    }

    print(line = ''): void {
        this.output.push(line);
    }

    write(text: string): void {
        this.output.push(...text.replace(/\n$/, '').split('\n'));
    }

    async readLine(prompt: string): Promise<string | null> {
        this.prompts.push(prompt);
        return this.script.shift() ?? null;
    }
}

/**
 * Command runner that records commands instead of running them
 */
export class RecordingRunner implements CommandRunner {
    readonly commands: string[] = [];

    constructor(private respond: (command: string) => string = () => '') {}

    async run(command: string): Promise<string> {
        this.commands.push(command);
        return this.respond(command);
    }
}

/**
 * A complete, valid extension document: a root menu with an inline-parameter
 * search, a plain command and a submenu.
 */
export function callbookDocument(name = 'RPBOOK'): Record<string, unknown> {
    return {
        name,
        description: 'Callsign lookups',
        help: 'Callbook help',
        about: 'Callbook about',
        version: '1.0',
        program: {
            start_msg: `Welcome to ${name}`,
            menu: {
                prompt: 'Callbook',
                items: [
                    {
                        id: 2,
                        key: 'L',
                        text: 'List',
                        help: 'List recent lookups',
                        io: { command: 'echo recent' },
                    },
                    {
                        id: 1,
                        key: 'S {_callsign}',
                        text: 'Search',
                        help: 'Search help',
                        about: 'Search about',
                        io: {
                            help: 'Enter a callsign',
                            prompts: [
                                {
                                    prompt: 'Callsign',
                                    inputs: [{ id: 1, type: 'string', required: true, name: '_callsign' }],
                                },
                            ],
                            command: 'curl https://example.test/{_callsign}',
                        },
                    },
                    {
                        id: 3,
                        key: 'M',
                        text: 'More',
                        help: 'More help',
                        menu: {
                            prompt: 'More',
                            help: 'More menu help',
                            items: [
                                {
                                    id: 1,
                                    text: 'Settings',
                                    help: 'Settings help',
                                    io: {
                                        prompts: [
                                            {
                                                prompt: 'Verbose and count',
                                                inputs: [
                                                    { id: 1, type: 'bool' },
                                                    { id: 2, type: 'int' },
                                                ],
                                            },
                                        ],
                                        command: 'set {1} {2}',
                                    },
                                },
                                {
                                    id: 2,
                                    text: 'Status',
                                    help: 'Status help',
                                    io: { command: 'status' },
                                },
                            ],
                        },
                    },
                ],
            },
        },
    };
}

/**
 * Smallest valid document: one item running one command
 */
export function minimalDocument(name: string, item: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        name,
        description: `${name} description`,
        program: {
            menu: {
                prompt: name,
                items: [{ id: 1, key: 'R', text: 'Run', help: 'Run it', io: { command: 'true' }, ...item }],
            },
        },
    };
}
