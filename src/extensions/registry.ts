import type { DocumentSource } from './source.js';
import type { Extension, ValidationError } from './types.js';
import { validateExtension } from './validator.js';

export type LookupResult =
    | { kind: 'found'; extension: Extension }
    | { kind: 'ambiguous'; candidates: string[] }
    | { kind: 'not-found' };

export interface LoadFailure {
    /** File identifier from the document source */
    file: string;
    errors: ValidationError[];
}

export interface LoadReport {
    extensions: ReadonlyMap<string, Extension>;
    failures: LoadFailure[];
}

/**
 * Extension Registry — validated extensions indexed by lower-cased name
 *
 * Every document is validated on its own; a broken file is reported and
 * skipped without affecting the rest of the batch. Once loaded, the
 * registry is only read.
 */
export class ExtensionRegistry {
    private extensions: Map<string, Extension> = new Map();

    /**
     * Replace the registry contents with the valid documents of a source
     */
    async load(source: DocumentSource): Promise<LoadReport> {
        this.extensions.clear();
        const failures: LoadFailure[] = [];

        for (const entry of await source.read()) {
            if (!entry.ok) {
                failures.push({ file: entry.file, errors: [{ path: '', message: entry.error }] });
                continue;
            }

            const result = validateExtension(entry.document, entry.file);
            if (!result.ok) {
                failures.push({ file: entry.file, errors: result.errors });
                continue;
            }

            const existing = this.extensions.get(result.extension.key);
            if (existing) {
                failures.push({
                    file: entry.file,
                    errors: [{
                        path: 'name',
                        message: `'${result.extension.name}' is already defined in ${existing.source}`,
                    }],
                });
                continue;
            }

            this.extensions.set(result.extension.key, result.extension);
        }

        return { extensions: this.extensions, failures };
    }

    /**
     * Resolve a user-typed name: exact match first, then unique prefix
     */
    lookup(query: string): LookupResult {
        const needle = query.trim().toLowerCase();
        if (!needle) return { kind: 'not-found' };

        const exact = this.extensions.get(needle);
        if (exact) return { kind: 'found', extension: exact };

        const matches = this.list().filter((ext) => ext.key.startsWith(needle));
        if (matches.length === 1) return { kind: 'found', extension: matches[0] };
        if (matches.length > 1) return { kind: 'ambiguous', candidates: matches.map((ext) => ext.name) };
        return { kind: 'not-found' };
    }

    /**
     * Get an extension by exact (case-insensitive) name
     */
    get(name: string): Extension | undefined {
        return this.extensions.get(name.toLowerCase());
    }

    /**
     * All extensions, ordered by lower-cased name
     */
    list(): Extension[] {
        return Array.from(this.extensions.values()).sort((a, b) =>
            a.key < b.key ? -1 : a.key > b.key ? 1 : 0,
        );
    }

    get size(): number {
        return this.extensions.size;
    }
}
