/**
 * Placeholder substitution for command templates
 *
 *   {1}          → value of the input with id 1
 *   {_callsign}  → value of the input named `_callsign`
 *
 * Names win over positions when both could apply.
 */

const PLACEHOLDER = /\{[^{}]+\}/g;

/**
 * Values collected for one IO block, keyed by input name and by input id
 */
export class Bindings {
    private named: Map<string, string> = new Map();
    private positional: Map<number, string> = new Map();

    /**
     * Bind an input by id, and by name when it has one
     */
    bind(id: number, name: string | undefined, value: string): void {
        this.positional.set(id, value);
        if (name !== undefined) {
            this.named.set(name, value);
        }
    }

    bindName(name: string, value: string): void {
        this.named.set(name, value);
    }

    hasName(name: string): boolean {
        return this.named.has(name);
    }

    /**
     * Look up the bare token (without braces)
     */
    resolve(token: string): string | undefined {
        const named = this.named.get(token);
        if (named !== undefined) return named;
        if (/^\d+$/.test(token)) {
            return this.positional.get(Number(token));
        }
        return undefined;
    }
}

export type SubstitutionResult =
    | { ok: true; command: string }
    | { ok: false; unresolved: string[] };

/**
 * Replace every known placeholder, then refuse the result if any `{...}`
 * token is left in it.
 */
export function substitute(template: string, bindings: Bindings): SubstitutionResult {
    const command = template.replace(PLACEHOLDER, (token) => bindings.resolve(token.slice(1, -1).trim()) ?? token);

    const leftover = command.match(PLACEHOLDER);
    if (leftover) {
        return { ok: false, unresolved: Array.from(new Set(leftover)) };
    }
    return { ok: true, command };
}

/**
 * Placeholders a template refers to, in order of first appearance
 */
export function placeholdersOf(template: string): string[] {
    return Array.from(new Set(template.match(PLACEHOLDER) ?? []));
}
