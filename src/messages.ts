// User-facing texts shared by the navigator and the IO executor.
// These go over the line link, so they stay plain: no colour, no symbols.

export const NO_HELP = 'No help available.';
export const NO_ABOUT = 'No about information available.';

export const MAIN_MENU_COMMANDS = '[A]About [H]Help [B]Back [X]Exit';

export function errorLine(message: string): string {
    return `Error: ${message}`;
}
