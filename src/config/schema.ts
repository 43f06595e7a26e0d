import { z } from 'zod';

/**
 * Application settings file (appsettings.yml), as written on disk
 */
export const settingsFileSchema = z.object({
    title: z.string().min(1).optional(),
    help: z.string().optional(),
    about: z.string().optional(),
    /** Relative paths resolve against the settings file's directory */
    extensions_dir: z.string().min(1).optional(),
    shell: z.string().min(1).optional(),
    log_file: z.string().min(1).optional(),
    spinner: z.boolean().optional(),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

/**
 * Resolved settings used by the session
 */
export interface AppSettings {
    title: string;
    help: string;
    about: string;
    /** Absolute path */
    extensionsDir: string;
    shell: string;
    /** Absolute path; no activity log when absent */
    logFile?: string;
    spinner: boolean;
    /** Settings file that was read, if any */
    source?: string;
}
