import type { IOBlock, Input, Prompt } from '../extensions/types.js';
import type { ActivityLog } from '../logging/activity-log.js';
import { NO_HELP, errorLine } from '../messages.js';
import { checkValue, parsePromptLine } from './inputs.js';
import type { LineIO } from './line-io.js';
import type { CommandRunner } from './runner.js';
import { Bindings, substitute } from './substitute.js';

/**
 * How a terminal action ended. None of these leave the menu.
 *
 * - `executed`  the command ran (whatever its exit status)
 * - `rejected`  the template had unresolved placeholders; nothing ran
 * - `failed`    the command runner could not run the command
 * - `aborted`   input ended while prompting; nothing ran
 */
export type IOOutcome = 'executed' | 'rejected' | 'failed' | 'aborted';

/** Value typed on the selection line for an item's inline parameter */
export interface InlineValue {
    name: string;
    value: string;
}

export interface IOExecutorDeps {
    io: LineIO;
    runner: CommandRunner;
    log?: ActivityLog;
}

/**
 * IO Prompt Executor — collects a terminal action's inputs, one prompt line
 * at a time, then builds and runs its command.
 */
export class IOPromptExecutor {
    constructor(private deps: IOExecutorDeps) {}

    async execute(block: IOBlock, inline?: InlineValue): Promise<IOOutcome> {
        const { io, runner, log } = this.deps;
        const bindings = new Bindings();

        if (inline) {
            this.bindInline(block, inline, bindings);
        }

        for (const prompt of block.prompts) {
            if (isBound(prompt, bindings)) continue;

            const values = await this.collect(prompt, block);
            if (values === null) return 'aborted';

            prompt.inputs.forEach((input, index) => bindings.bind(input.id, input.name, values[index]));
        }

        const result = substitute(block.command, bindings);
        if (!result.ok) {
            const tokens = result.unresolved.join(', ');
            io.print(errorLine(`unknown placeholder(s) in command: ${tokens}`));
            await log?.record(`rejected command template "${block.command}": unresolved ${tokens}`);
            return 'rejected';
        }

        await log?.record(`run: ${result.command}`);
        try {
            const output = await runner.run(result.command);
            if (output) {
                io.write(output.endsWith('\n') ? output : `${output}\n`);
            }
            return 'executed';
        } catch (err) {
            const message = (err as Error).message;
            io.print(`Error running command: ${message}`);
            await log?.record(`command failed: ${message}`);
            return 'failed';
        }
    }

    /**
     * Ask one prompt until its line validates. Null when input ends.
     */
    private async collect(prompt: Prompt, block: IOBlock): Promise<string[] | null> {
        const { io } = this.deps;

        for (;;) {
            const line = await io.readLine(`${prompt.prompt}: `);
            if (line === null) return null;

            const trimmed = line.trim();
            const lower = trimmed.toLowerCase();
            if (lower === 'h' || lower === 'help') {
                io.print(block.help ?? NO_HELP);
                continue;
            }

            if (prompt.inputs.length === 0) return [];

            const result = parsePromptLine(trimmed, prompt.inputs);
            if (result.ok) return result.values;

            for (const message of result.errors) {
                io.print(errorLine(message));
            }
        }
    }

    /**
     * A value that fails its input's type check is dropped, so the prompt
     * asks for it again.
     */
    private bindInline(block: IOBlock, inline: InlineValue, bindings: Bindings): void {
        const input = findInput(block, inline.name);
        if (!input) {
            bindings.bindName(inline.name, inline.value);
            return;
        }

        const problem = checkValue(input, inline.value);
        if (problem) {
            this.deps.io.print(errorLine(problem));
            return;
        }
        bindings.bind(input.id, input.name, inline.value);
    }
}

function findInput(block: IOBlock, name: string): Input | undefined {
    for (const prompt of block.prompts) {
        const input = prompt.inputs.find((candidate) => candidate.name === name);
        if (input) return input;
    }
    return undefined;
}

function isBound(prompt: Prompt, bindings: Bindings): boolean {
    return (
        prompt.inputs.length > 0 &&
        prompt.inputs.every((input) => input.name !== undefined && bindings.hasName(input.name))
    );
}
