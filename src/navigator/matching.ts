import type { Menu, MenuItem } from '../extensions/types.js';
import { splitLine } from '../io/inputs.js';

export type ItemMatch =
    | { kind: 'found'; item: MenuItem; inlineValue?: string }
    | { kind: 'ambiguous'; candidates: MenuItem[] }
    | { kind: 'not-found' };

/**
 * Resolve a query against a menu: exact key, then exact text, then a
 * unique text prefix. Case-insensitive throughout.
 */
export function matchItem(menu: Menu, query: string): ItemMatch {
    const needle = query.trim().toLowerCase();
    if (!needle) return { kind: 'not-found' };

    const byKey = menu.items.find((item) => item.match.key === needle);
    if (byKey) return { kind: 'found', item: byKey };

    const byText = menu.items.find((item) => item.match.text === needle);
    if (byText) return { kind: 'found', item: byText };

    const prefixed = menu.items.filter((item) => item.match.text.startsWith(needle));
    if (prefixed.length === 1) return { kind: 'found', item: prefixed[0] };
    if (prefixed.length > 1) return { kind: 'ambiguous', candidates: prefixed };
    return { kind: 'not-found' };
}

/**
 * Resolve a selection line. When the whole line names no item, an item
 * with an inline parameter can still be chosen as `<key or text> <value>`.
 */
export function matchSelection(menu: Menu, line: string): ItemMatch {
    const whole = matchItem(menu, line);
    if (whole.kind !== 'not-found') return whole;

    const trimmed = line.trim();

    for (const item of menu.items) {
        if (!item.inlineParam) continue;

        const words: Array<[string | undefined, string | undefined]> = [
            [item.key, item.match.key],
            [item.text, item.match.text],
        ];
        for (const [display, word] of words) {
            if (display === undefined || word === undefined) continue;
            // Lower-casing can change a word's length, so compare on the typed text
            if (trimmed.slice(0, display.length).toLowerCase() !== word) continue;
            if (!/\s/.test(trimmed.charAt(display.length))) continue;

            const rest = trimmed.slice(display.length).trim();
            const values = splitLine(rest);
            return { kind: 'found', item, inlineValue: values.length === 1 ? values[0] : rest };
        }
    }

    return whole;
}
