export const DEFAULT_SETTINGS_FILE = 'appsettings.yml';

export const DEFAULT_SETTINGS = {
    title: 'LINEMENU',
    help: 'Type an extension name, or the start of one, to open it. '
        + 'H <name> shows its help, A <name> its about text. B goes back, X exits.',
    about: 'linemenu - menus and commands for narrow text links.',
    extensionsDir: 'extensions',
    shell: '/bin/sh',
    spinner: false,
} as const;

/** Environment variables that override the settings file */
export const ENV = {
    settings: 'LINEMENU_SETTINGS',
    extensionsDir: 'LINEMENU_EXTENSIONS_DIR',
    logFile: 'LINEMENU_LOG_FILE',
} as const;
