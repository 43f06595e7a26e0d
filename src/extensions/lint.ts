import { placeholdersOf } from '../io/substitute.js';
import type { Extension, IOBlock, Menu } from './types.js';

export interface PlaceholderWarning {
    /** Item texts from the root menu down, e.g. `Lookup > Search` */
    location: string;
    token: string;
}

/**
 * Placeholders that no input of their IO block can ever fill.
 *
 * Templates are free text, so these are only warnings at load time; the
 * command is refused when it is actually run.
 */
export function findUnboundPlaceholders(extension: Extension): PlaceholderWarning[] {
    const warnings: PlaceholderWarning[] = [];
    walk(extension.program.menu, [], warnings);
    return warnings;
}

function walk(menu: Menu, trail: string[], warnings: PlaceholderWarning[]): void {
    for (const item of menu.items) {
        const location = [...trail, item.text];
        if (item.action.kind === 'menu') {
            walk(item.action.menu, location, warnings);
            continue;
        }
        for (const token of unbound(item.action.io)) {
            warnings.push({ location: location.join(' > '), token });
        }
    }
}

function unbound(io: IOBlock): string[] {
    const keys = new Set<string>();
    for (const prompt of io.prompts) {
        for (const input of prompt.inputs) {
            keys.add(String(input.id));
            if (input.name !== undefined) keys.add(input.name);
        }
    }
    return placeholdersOf(io.command).filter((token) => !keys.has(token.slice(1, -1).trim()));
}
