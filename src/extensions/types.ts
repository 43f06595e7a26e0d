/**
 * Extension System — Types
 *
 * An extension is a YAML document describing a tree of menus whose leaves
 * are parameterized shell commands. Documents are validated once, at load
 * time, and turned into the immutable structures below.
 */

// ─── Reserved tokens ───

/** Single-key commands the navigator owns in every menu */
export const RESERVED_KEYS: readonly string[] = ['a', 'b', 'h', 'x'];

/** Full-word commands the navigator owns in every menu */
export const RESERVED_TEXTS: readonly string[] = ['about', 'back', 'help', 'exit'];

// ─── Inputs & prompts ───

export type InputType = 'string' | 'int' | 'bool';

export const INPUT_TYPES: readonly InputType[] = ['string', 'int', 'bool'];

export interface Input {
    /** 1-based position within the prompt line, also a placeholder key */
    id: number;
    type: InputType;
    required: boolean;
    /** Alternate placeholder key */
    name?: string;
}

export interface Prompt {
    id: number;
    /** Text shown before reading the line */
    prompt: string;
    /** Sorted by id */
    inputs: Input[];
}

export interface IOBlock {
    /** Sorted by id */
    prompts: Prompt[];
    help?: string;
    /** Shell command template with `{token}` placeholders */
    command: string;
}

// ─── Menus ───

export type MenuAction =
    | { kind: 'io'; io: IOBlock }
    | { kind: 'menu'; menu: Menu };

export interface MenuItem {
    id: number;
    /** Display key, without any inline parameter suffix */
    key?: string;
    /** Display text, without any inline parameter suffix */
    text: string;
    help: string;
    about?: string;
    /** Input name the user may supply on the selection line (`S W1AW`) */
    inlineParam?: string;
    action: MenuAction;
    /** Lower-cased key/text used for matching */
    match: {
        key?: string;
        text: string;
    };
}

export interface Menu {
    prompt: string;
    help?: string;
    about?: string;
    /** Sorted by id */
    items: MenuItem[];
}

export interface Program {
    startMessage?: string;
    menu: Menu;
}

// ─── Extension ───

export interface Extension {
    /** Display name, as written in the document */
    name: string;
    /** Lower-cased name, the registry key */
    key: string;
    description: string;
    about?: string;
    help?: string;
    version?: string;
    program: Program;
    /** File the extension was loaded from */
    source: string;
}

// ─── Validation ───

export interface ValidationError {
    /** Dotted path into the document, e.g. `program.menu.items[2].io` */
    path: string;
    message: string;
}

export type ValidationResult =
    | { ok: true; extension: Extension }
    | { ok: false; errors: ValidationError[] };
