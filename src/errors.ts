/**
 * Error types raised across module boundaries.
 *
 * Most user-input failures (ambiguous names, bad values, unresolved
 * placeholders) are plain result values and never thrown; these are the
 * failures that have to unwind.
 */

/**
 * The command interpreter could not run the command at all
 */
export class CommandExecutionError extends Error {
    constructor(message: string, readonly command: string) {
        super(message);
        this.name = 'CommandExecutionError';
    }
}

/**
 * The application settings file is unreadable or invalid
 */
export class SettingsError extends Error {
    constructor(message: string, readonly file: string) {
        super(message);
        this.name = 'SettingsError';
    }
}
