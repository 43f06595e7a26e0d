import { z } from 'zod';

/**
 * Extension document schemas — the structural half of validation.
 *
 * These describe the YAML document as authors write it (snake_case keys,
 * unsorted lists). Cross-field rules such as reserved tokens and unique
 * input names are checked afterwards by the validator.
 */

// ─── Document shapes ───

export interface InputDocument {
    id: number;
    type: 'string' | 'int' | 'bool';
    required?: boolean;
    name?: string;
}

export interface PromptDocument {
    id?: number;
    prompt: string;
    inputs?: InputDocument[] | null;
}

export interface IODocument {
    prompts?: PromptDocument[] | null;
    help?: string;
    command: string;
}

export interface MenuItemDocument {
    id: number;
    key?: string;
    text: string;
    help: string;
    about?: string;
    io?: IODocument;
    menu?: MenuDocument;
}

export interface MenuDocument {
    prompt: string;
    help?: string;
    about?: string;
    items: MenuItemDocument[];
}

export interface ExtensionDocument {
    name: string;
    description: string;
    about?: string;
    help?: string;
    version?: string;
    program: {
        start_msg?: string | null;
        menu: MenuDocument;
    };
}

// ─── Scalar helpers ───

const MAPPING = { required_error: 'is required', invalid_type_error: 'must be a mapping' };
const LIST = { required_error: 'is required', invalid_type_error: 'must be a list' };

/** YAML turns `key: 1` or `text: yes` into non-strings; authors mean text */
function toText(value: unknown): unknown {
    return typeof value === 'number' || typeof value === 'boolean' ? String(value) : value;
}

function toInteger(value: unknown): unknown {
    if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
        return Number(value);
    }
    return value;
}

function toBoolean(value: unknown): unknown {
    if (typeof value === 'string') {
        const lower = value.trim().toLowerCase();
        if (lower === 'true') return true;
        if (lower === 'false') return false;
    }
    return value;
}

const text = () =>
    z.preprocess(toText, z.string({ required_error: 'is required', invalid_type_error: 'must be a string' }));

const integer = () =>
    z.preprocess(
        toInteger,
        z.number({ required_error: 'is required', invalid_type_error: 'must be an integer' }).int('must be an integer'),
    );

const inputType = z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['string', 'int', 'bool'], {
        errorMap: (_issue, ctx) => ({
            message: ctx.data === undefined ? 'is required' : 'must be one of string, int, bool',
        }),
    }),
);

// ─── Schemas ───

export const inputSchema = z.object(
    {
        id: integer().refine((id) => id >= 1, 'must be 1 or greater'),
        type: inputType,
        required: z.preprocess(toBoolean, z.boolean({ invalid_type_error: 'must be true or false' })).optional(),
        name: text().optional(),
    },
    MAPPING,
);

export const promptSchema = z.object(
    {
        id: integer().optional(),
        prompt: text(),
        inputs: z.array(inputSchema, LIST).nullish(),
    },
    MAPPING,
);

/** A one-element list is accepted in place of the mapping */
export const ioSchema = z.preprocess(
    (value) => (Array.isArray(value) && value.length > 0 ? value[0] : value),
    z.object(
        {
            prompts: z.array(promptSchema, LIST).nullish(),
            help: text().optional(),
            command: text(),
        },
        MAPPING,
    ),
);

export const menuSchema: z.ZodType<MenuDocument, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object(
        {
            prompt: text(),
            help: text().optional(),
            about: text().optional(),
            items: z.array(menuItemSchema, LIST),
        },
        MAPPING,
    ),
);

export const menuItemSchema: z.ZodType<MenuItemDocument, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object(
        {
            id: integer(),
            key: text().optional(),
            text: text(),
            help: text(),
            about: text().optional(),
            io: ioSchema.optional(),
            menu: menuSchema.optional(),
        },
        MAPPING,
    ),
);

export const extensionDocumentSchema: z.ZodType<ExtensionDocument, z.ZodTypeDef, unknown> = z.object(
    {
        name: text(),
        description: text(),
        about: text().optional(),
        help: text().optional(),
        version: text().optional(),
        program: z.object(
            {
                start_msg: text().nullish(),
                menu: menuSchema,
            },
            MAPPING,
        ),
    },
    MAPPING,
);
