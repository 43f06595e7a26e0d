import path from 'node:path';
import { SettingsLoader } from '../config/loader.js';
import type { AppSettings } from '../config/schema.js';
import { ExtensionRegistry, type LoadReport } from '../extensions/registry.js';
import { DirectorySource } from '../extensions/source.js';

/** Options shared by every linemenu command */
export type GlobalOptions = {
    settings?: string;
    extensions?: string;
    plain?: boolean;
};

export interface Bootstrapped {
    settings: AppSettings;
    registry: ExtensionRegistry;
    report: LoadReport;
}

/**
 * Resolve settings and load every extension they point at
 */
export async function bootstrap(options: GlobalOptions): Promise<Bootstrapped> {
    const loaded = await new SettingsLoader({ file: options.settings }).load();
    const settings: AppSettings = options.extensions
        ? { ...loaded, extensionsDir: path.resolve(options.extensions) }
        : loaded;

    const registry = new ExtensionRegistry();
    const report = await registry.load(new DirectorySource(settings.extensionsDir));

    return { settings, registry, report };
}
