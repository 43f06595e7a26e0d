import type { ZodIssue } from 'zod';
import { extensionDocumentSchema } from './schema.js';
import type { IODocument, MenuDocument, MenuItemDocument } from './schema.js';
import { RESERVED_KEYS, RESERVED_TEXTS } from './types.js';
import type {
    Extension,
    IOBlock,
    Input,
    Menu,
    MenuAction,
    MenuItem,
    Prompt,
    ValidationError,
    ValidationResult,
} from './types.js';

const RESERVED = new Set([...RESERVED_KEYS, ...RESERVED_TEXTS]);

/**
 * Validate a parsed extension document and build the typed extension.
 *
 * Structural rules (required fields, scalar types) come from the zod schema;
 * the semantic rules below only run once the structure is sound. Never
 * throws and never touches anything outside its arguments.
 */
export function validateExtension(document: unknown, source = '<memory>'): ValidationResult {
    const parsed = extensionDocumentSchema.safeParse(document);
    if (!parsed.success) {
        return { ok: false, errors: parsed.error.issues.map(issueToError) };
    }

    const doc = parsed.data;
    const errors: ValidationError[] = [];

    const name = doc.name.trim();
    if (name.length === 0) {
        errors.push({ path: 'name', message: 'must not be empty' });
    } else if (/\s/.test(name)) {
        errors.push({ path: 'name', message: `'${name}' must be a single word` });
    }

    const menu = buildMenu(doc.program.menu, 'program.menu', errors);

    if (errors.length > 0) {
        return { ok: false, errors };
    }

    const extension: Extension = {
        name,
        key: name.toLowerCase(),
        description: doc.description,
        about: doc.about,
        help: doc.help,
        version: doc.version,
        program: {
            startMessage: doc.program.start_msg ?? undefined,
            menu,
        },
        source,
    };
    return { ok: true, extension };
}

/**
 * Split `S {search}` into its display part and parameter name
 */
export function parseInlineParam(value: string): { base: string; param?: string } {
    const match = value.match(/^(.*\S)\s+\{(\w+)\}$/);
    if (match) {
        return { base: match[1], param: match[2] };
    }
    return { base: value };
}

/**
 * Render a path array as `program.menu.items[2].io`
 */
export function formatPath(segments: readonly (string | number)[]): string {
    let out = '';
    for (const segment of segments) {
        if (typeof segment === 'number') {
            out += `[${segment}]`;
        } else {
            out += out.length > 0 ? `.${segment}` : segment;
        }
    }
    return out;
}

/**
 * One-line rendering used by the CLI and the activity log
 */
export function formatValidationError(error: ValidationError): string {
    return error.path ? `${error.path}: ${error.message}` : error.message;
}

function issueToError(issue: ZodIssue): ValidationError {
    return { path: formatPath(issue.path), message: issue.message };
}

// ─── Tree construction ───

function buildMenu(doc: MenuDocument, path: string, errors: ValidationError[]): Menu {
    const items: MenuItem[] = [];

    doc.items.forEach((itemDoc, index) => {
        const item = buildMenuItem(itemDoc, `${path}.items[${index}]`, errors);
        if (item) items.push(item);
    });

    return {
        prompt: doc.prompt,
        help: doc.help,
        about: doc.about,
        items: items.sort((a, b) => a.id - b.id),
    };
}

function buildMenuItem(doc: MenuItemDocument, path: string, errors: ValidationError[]): MenuItem | null {
    const key = doc.key !== undefined ? parseInlineParam(doc.key.trim()) : undefined;
    const text = parseInlineParam(doc.text.trim());

    if (key && RESERVED.has(key.base.toLowerCase())) {
        errors.push({ path: `${path}.key`, message: `'${doc.key}' is reserved` });
    }
    if (text.base.length === 0) {
        errors.push({ path: `${path}.text`, message: 'must not be empty' });
    } else if (RESERVED.has(text.base.toLowerCase())) {
        errors.push({ path: `${path}.text`, message: `'${doc.text}' is reserved` });
    }
    if (key?.param && text.param && key.param !== text.param) {
        errors.push({
            path,
            message: `inline parameters '${key.param}' and '${text.param}' on key and text differ`,
        });
    }

    const inlineParam = key?.param ?? text.param;
    const hasIO = doc.io !== undefined;
    const hasMenu = doc.menu !== undefined;

    if (hasIO === hasMenu) {
        errors.push({ path, message: "must have exactly one of 'io' or 'menu'" });
    }

    let action: MenuAction | null = null;
    if (doc.io !== undefined && !hasMenu) {
        action = { kind: 'io', io: buildIO(doc.io, `${path}.io`, errors) };
    } else if (doc.menu !== undefined && !hasIO) {
        action = { kind: 'menu', menu: buildMenu(doc.menu, `${path}.menu`, errors) };
    }

    if (inlineParam !== undefined && action) {
        checkInlineParam(inlineParam, action, path, errors);
    }

    if (!action) return null;

    return {
        id: doc.id,
        key: key?.base,
        text: text.base,
        help: doc.help,
        about: doc.about,
        inlineParam,
        action,
        match: {
            key: key?.base.toLowerCase(),
            text: text.base.toLowerCase(),
        },
    };
}

function checkInlineParam(param: string, action: MenuAction, path: string, errors: ValidationError[]): void {
    if (action.kind === 'menu') {
        errors.push({ path, message: `inline parameter '${param}' is only valid with 'io', not 'menu'` });
        return;
    }

    const inputs = action.io.prompts.flatMap((p) => p.inputs);
    if (inputs.length !== 1) {
        errors.push({ path, message: `inline parameter requires exactly 1 input, found ${inputs.length}` });
    } else if (inputs[0].name !== param) {
        errors.push({
            path,
            message: `inline parameter '${param}' does not match input name '${inputs[0].name ?? ''}'`,
        });
    }
}

function buildIO(doc: IODocument, path: string, errors: ValidationError[]): IOBlock {
    const seenNames = new Map<string, string>();
    const prompts: Prompt[] = [];

    (doc.prompts ?? []).forEach((promptDoc, p) => {
        const promptPath = `${path}.prompts[${p}]`;
        const seenIds = new Set<number>();
        const inputs: Input[] = [];

        (promptDoc.inputs ?? []).forEach((inputDoc, i) => {
            const inputPath = `${promptPath}.inputs[${i}]`;

            if (seenIds.has(inputDoc.id)) {
                errors.push({ path: `${inputPath}.id`, message: `duplicate input id ${inputDoc.id}` });
            }
            seenIds.add(inputDoc.id);

            if (inputDoc.name !== undefined) {
                const earlier = seenNames.get(inputDoc.name);
                if (earlier !== undefined) {
                    errors.push({
                        path: `${inputPath}.name`,
                        message: `duplicate input name '${inputDoc.name}' (first used at ${earlier})`,
                    });
                } else {
                    seenNames.set(inputDoc.name, inputPath);
                }
            }

            inputs.push({
                id: inputDoc.id,
                type: inputDoc.type,
                required: inputDoc.required ?? false,
                name: inputDoc.name,
            });
        });

        prompts.push({
            id: promptDoc.id ?? 0,
            prompt: promptDoc.prompt,
            inputs: inputs.sort((a, b) => a.id - b.id),
        });
    });

    return {
        prompts: prompts.sort((a, b) => a.id - b.id),
        help: doc.help,
        command: doc.command,
    };
}
