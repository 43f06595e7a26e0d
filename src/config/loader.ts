import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { SettingsError } from '../errors.js';
import { formatPath } from '../extensions/validator.js';
import { DEFAULT_SETTINGS, DEFAULT_SETTINGS_FILE, ENV } from './defaults.js';
import { settingsFileSchema, type AppSettings, type SettingsFile } from './schema.js';

export interface SettingsLoaderOptions {
    /** Explicit settings file; must exist when given */
    file?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Settings Loader — appsettings.yml + defaults + environment overrides
 *
 * Resolution order for each value: environment, settings file, default.
 * A missing default settings file is fine; a missing explicit one is not.
 */
export class SettingsLoader {
    constructor(private options: SettingsLoaderOptions = {}) {}

    async load(): Promise<AppSettings> {
        const cwd = this.options.cwd ?? process.cwd();
        const env = this.options.env ?? process.env;

        const explicit = this.options.file ?? env[ENV.settings];
        const filePath = path.resolve(cwd, explicit ?? DEFAULT_SETTINGS_FILE);

        const content = await this.readSettings(filePath, explicit !== undefined);
        const file: SettingsFile = content === null ? {} : this.parse(content, filePath);
        const baseDir = content === null ? cwd : path.dirname(filePath);

        const envExtensionsDir = env[ENV.extensionsDir];
        const extensionsDir = envExtensionsDir
            ? path.resolve(cwd, envExtensionsDir)
            : path.resolve(baseDir, file.extensions_dir ?? DEFAULT_SETTINGS.extensionsDir);

        const envLogFile = env[ENV.logFile];
        const logFile = envLogFile
            ? path.resolve(cwd, envLogFile)
            : file.log_file !== undefined ? path.resolve(baseDir, file.log_file) : undefined;

        return {
            title: file.title ?? DEFAULT_SETTINGS.title,
            help: file.help ?? DEFAULT_SETTINGS.help,
            about: file.about ?? DEFAULT_SETTINGS.about,
            extensionsDir,
            shell: file.shell ?? DEFAULT_SETTINGS.shell,
            logFile,
            spinner: file.spinner ?? DEFAULT_SETTINGS.spinner,
            source: content === null ? undefined : filePath,
        };
    }

    private async readSettings(filePath: string, required: boolean): Promise<string | null> {
        try {
            return await readFile(filePath, 'utf-8');
        } catch (err) {
            const code = (err as NodeJS.ErrnoException).code;
            if (code === 'ENOENT' && !required) return null;
            throw new SettingsError(`Cannot read settings file ${filePath}: ${(err as Error).message}`, filePath);
        }
    }

    private parse(content: string, filePath: string): SettingsFile {
        let raw: unknown;
        try {
            raw = parseYaml(content) ?? {};
        } catch (err) {
            throw new SettingsError(`Invalid YAML in ${filePath}: ${(err as Error).message}`, filePath);
        }

        const parsed = settingsFileSchema.safeParse(raw);
        if (!parsed.success) {
            const details = parsed.error.issues
                .map((issue) => (issue.path.length > 0 ? `${formatPath(issue.path)}: ${issue.message}` : issue.message))
                .join('; ');
            throw new SettingsError(`Invalid settings in ${filePath}: ${details}`, filePath);
        }
        return parsed.data;
    }
}
