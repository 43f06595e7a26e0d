import { readFile, readdir, access } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

/**
 * One raw document handed to the registry: either decoded or the reason it
 * could not be.
 */
export type SourceEntry =
    | { file: string; ok: true; document: unknown }
    | { file: string; ok: false; error: string };

/**
 * Where extension documents come from
 */
export interface DocumentSource {
    read(): Promise<SourceEntry[]>;
}

/**
 * Directory Source — every `*.yml` / `*.yaml` file in one directory
 *
 * Files are read in name order so duplicate-name resolution is stable.
 * A missing directory is not an error; it simply yields no documents.
 */
export class DirectorySource implements DocumentSource {
    constructor(private dirPath: string) {}

    async read(): Promise<SourceEntry[]> {
        try {
            await access(this.dirPath);
        } catch {
            return [];
        }

        const entries = await readdir(this.dirPath, { withFileTypes: true });
        const files = entries
            .filter((entry) => entry.isFile() && /\.ya?ml$/i.test(entry.name))
            .map((entry) => entry.name)
            .sort();

        const results: SourceEntry[] = [];
        for (const name of files) {
            results.push(await this.readDocument(path.join(this.dirPath, name)));
        }
        return results;
    }

    private async readDocument(filePath: string): Promise<SourceEntry> {
        let document: unknown;
        try {
            const content = await readFile(filePath, 'utf-8');
            document = parseYaml(content);
        } catch (err) {
            return { file: filePath, ok: false, error: `cannot be parsed: ${(err as Error).message}` };
        }

        if (!isMapping(document)) {
            return { file: filePath, ok: false, error: 'file must contain a YAML mapping' };
        }
        return { file: filePath, ok: true, document };
    }
}

/**
 * In-memory source, keyed by a file identifier
 */
export class MemorySource implements DocumentSource {
    constructor(private documents: Record<string, unknown>) {}

    async read(): Promise<SourceEntry[]> {
        return Object.entries(this.documents).map(([file, document]) =>
            isMapping(document)
                ? { file, ok: true as const, document }
                : { file, ok: false as const, error: 'file must contain a YAML mapping' },
        );
    }
}

function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
