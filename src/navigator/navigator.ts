import type { Extension, Menu, MenuItem } from '../extensions/types.js';
import type { ExtensionRegistry, LookupResult } from '../extensions/registry.js';
import type { IOPromptExecutor } from '../io/executor.js';
import type { LineIO } from '../io/line-io.js';
import type { ActivityLog } from '../logging/activity-log.js';
import { MAIN_MENU_COMMANDS, NO_ABOUT, NO_HELP } from '../messages.js';
import { matchItem, matchSelection, type ItemMatch } from './matching.js';
import {
    MAIN_MENU,
    currentMenu,
    enterExtension,
    popMenu,
    pushMenu,
    type NavigationState,
} from './state.js';

const EXIT = ['x', 'exit'];
const HELP = ['h', 'help'];
const ABOUT = ['a', 'about'];
const BACK = ['b', 'back'];

export type StepOutcome = 'continue' | 'exit';

type TextKind = 'help' | 'about';

export interface NavigatorSettings {
    /** Main menu banner */
    title: string;
    help?: string;
    about?: string;
}

export interface NavigatorDeps {
    registry: ExtensionRegistry;
    executor: IOPromptExecutor;
    io: LineIO;
    settings: NavigatorSettings;
    log?: ActivityLog;
}

/**
 * Menu Navigator — the session's control loop
 *
 * Shows the screen for the current state, reads one line, acts on it, and
 * repeats until the user exits or input ends. Every failure to resolve a
 * line is reported and leaves the state as it was.
 */
export class MenuNavigator {
    private navigation: NavigationState = MAIN_MENU;

    constructor(private deps: NavigatorDeps) {}

    get state(): NavigationState {
        return this.navigation;
    }

    /**
     * Run until `X`/`Exit` or end of input. Resolves to the exit code.
     */
    async run(): Promise<number> {
        for (;;) {
            this.render();
            const line = await this.deps.io.readLine('> ');
            if (line === null) return 0;
            if ((await this.handle(line)) === 'exit') return 0;
        }
    }

    /**
     * Print the screen for the current state
     */
    render(): void {
        const { io, registry, settings } = this.deps;
        const menu = currentMenu(this.navigation);

        io.print();
        if (!menu) {
            io.print(`- ${settings.title} -`);
            io.print(MAIN_MENU_COMMANDS);
            io.print();
            io.print(`Select Extension: ${registry.list().map((ext) => ext.name).join(', ')}`);
            return;
        }
        io.print(`${menu.prompt}: ${menu.items.map(describeItem).join(' ')}`);
    }

    /**
     * Act on one line of user input
     */
    async handle(line: string): Promise<StepOutcome> {
        const input = line.trim();
        if (!input) return 'continue';

        const lower = input.toLowerCase();

        if (EXIT.includes(lower)) {
            await this.deps.log?.record('session exit');
            return 'exit';
        }
        if (HELP.includes(lower)) {
            this.showScopeText('help');
            return 'continue';
        }
        if (ABOUT.includes(lower)) {
            this.showScopeText('about');
            return 'continue';
        }
        if (BACK.includes(lower)) {
            this.navigation = popMenu(this.navigation);
            return 'continue';
        }

        const described = input.match(/^(\S+)\s+(.+)$/);
        if (described) {
            const command = described[1].toLowerCase();
            if (HELP.includes(command)) {
                this.describe('help', described[2]);
                return 'continue';
            }
            if (ABOUT.includes(command)) {
                this.describe('about', described[2]);
                return 'continue';
            }
        }

        const menu = currentMenu(this.navigation);
        if (!menu) {
            await this.selectExtension(input);
        } else {
            await this.selectItem(menu, input);
        }
        return 'continue';
    }

    // ─── Main menu ───

    private async selectExtension(query: string): Promise<void> {
        const extension = this.resolveExtension(query);
        if (!extension) return;

        this.navigation = enterExtension(extension);
        await this.deps.log?.record(`enter ${extension.name}`);
        if (extension.program.startMessage) {
            this.deps.io.print(extension.program.startMessage);
        }
    }

    private resolveExtension(query: string): Extension | null {
        const result: LookupResult = this.deps.registry.lookup(query);
        switch (result.kind) {
            case 'found':
                return result.extension;
            case 'ambiguous':
                this.deps.io.print(`Options: ${result.candidates.join(', ')}`);
                return null;
            case 'not-found':
                this.deps.io.print(`Unknown extension: ${query}`);
                return null;
        }
    }

    // ─── Inside an extension ───

    private async selectItem(menu: Menu, line: string): Promise<void> {
        const selected = this.resolveItem(matchSelection(menu, line), line);
        if (!selected) return;

        const { item, inlineValue } = selected;
        if (item.action.kind === 'menu') {
            this.navigation = pushMenu(this.navigation, item.action.menu);
            return;
        }

        const inline =
            inlineValue !== undefined && item.inlineParam !== undefined
                ? { name: item.inlineParam, value: inlineValue }
                : undefined;
        await this.deps.executor.execute(item.action.io, inline);
    }

    private resolveItem(match: ItemMatch, query: string): { item: MenuItem; inlineValue?: string } | null {
        switch (match.kind) {
            case 'found':
                return { item: match.item, inlineValue: match.inlineValue };
            case 'ambiguous':
                this.deps.io.print(`Options: ${match.candidates.map((item) => item.text).join(', ')}`);
                return null;
            case 'not-found':
                this.deps.io.print(`Unknown option: ${query}`);
                return null;
        }
    }

    // ─── Help & about ───

    /**
     * Bare `H` / `A`: text for wherever the user currently is
     */
    private showScopeText(kind: TextKind): void {
        const fallback = kind === 'help' ? NO_HELP : NO_ABOUT;
        const state = this.navigation;

        if (state.kind === 'main') {
            this.deps.io.print(this.deps.settings[kind] ?? fallback);
            return;
        }

        const { extension, stack } = state;
        if (stack.length === 1) {
            this.deps.io.print(extension[kind] ?? fallback);
            return;
        }
        this.deps.io.print(stack[stack.length - 1][kind] ?? extension[kind] ?? fallback);
    }

    /**
     * `H {name}` / `A {name}`: text for an extension or item, without entering it
     */
    private describe(kind: TextKind, query: string): void {
        const fallback = kind === 'help' ? NO_HELP : NO_ABOUT;
        const menu = currentMenu(this.navigation);

        if (!menu) {
            const extension = this.resolveExtension(query);
            if (extension) this.deps.io.print(extension[kind] ?? fallback);
            return;
        }

        const resolved = this.resolveItem(matchItem(menu, query), query);
        if (resolved) this.deps.io.print(resolved.item[kind] ?? fallback);
    }
}

/**
 * `[S]Search (call)`: key in brackets, inline parameter in parentheses
 */
export function describeItem(item: MenuItem): string {
    const key = item.key ? `[${item.key}]` : '';
    const param = item.inlineParam ? ` (${item.inlineParam})` : '';
    return `${key}${item.text}${param}`;
}
