import type { Input } from '../extensions/types.js';

export type LineResult =
    | { ok: true; values: string[] }
    | { ok: false; errors: string[] };

const BOOLEAN_WORDS = ['true', 'false'];

/**
 * Split a prompt line into values.
 *
 * Whitespace separates values; single or double quotes group words and can
 * produce an empty value (`""`). A backslash outside single quotes escapes
 * the next character. A line with an unterminated quote is split on
 * whitespace alone.
 */
export function splitLine(line: string): string[] {
    return splitQuoted(line) ?? line.split(/\s+/).filter(Boolean);
}

function splitQuoted(line: string): string[] | null {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (quote === '"' && ch === '\\' && (line[i + 1] === '"' || line[i + 1] === '\\')) {
                current += line[++i];
            } else {
                current += ch;
            }
        } else if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
        } else if (ch === '\\' && i + 1 < line.length) {
            current += line[++i];
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
        } else {
            current += ch;
            inToken = true;
        }
    }

    if (quote) return null;
    if (inToken) tokens.push(current);
    return tokens;
}

/**
 * Check one prompt line against the prompt's inputs (sorted by id).
 *
 * A blank line is accepted when no input is required and binds every input
 * to an empty value.
 */
export function parsePromptLine(line: string, inputs: readonly Input[]): LineResult {
    const values = line.trim() ? splitLine(line) : [];

    if (values.length !== inputs.length) {
        if (values.length === 0) {
            if (!inputs.some((input) => input.required)) {
                return { ok: true, values: inputs.map(() => '') };
            }
            return { ok: false, errors: ['input is required'] };
        }
        return { ok: false, errors: [`expected ${inputs.length} input(s), got ${values.length}`] };
    }

    const errors: string[] = [];
    inputs.forEach((input, index) => {
        const problem = checkValue(input, values[index]);
        if (problem) errors.push(problem);
    });

    return errors.length > 0 ? { ok: false, errors } : { ok: true, values };
}

/**
 * Returns the problem with a single value, or null when it is acceptable
 */
export function checkValue(input: Input, value: string): string | null {
    if (value === '') {
        return input.required ? `input ${input.id} is required` : null;
    }

    switch (input.type) {
        case 'int':
            return /^[+-]?\d+$/.test(value) ? null : `input ${input.id} must be an integer`;
        case 'bool':
            return BOOLEAN_WORDS.includes(value.toLowerCase()) ? null : `input ${input.id} must be true or false`;
        case 'string':
            return null;
    }
}
