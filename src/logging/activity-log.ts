import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';

/**
 * Activity Log — timestamped record of a session, kept apart from the
 * user's line link.
 *
 * Without a file path every call is a no-op. If the file cannot be written
 * the failure is reported once on stderr and logging stops for the rest of
 * the session.
 */
export class ActivityLog {
    private disabled = false;

    constructor(private filePath?: string) {}

    get file(): string | undefined {
        return this.filePath;
    }

    async record(message: string): Promise<void> {
        if (!this.filePath || this.disabled) return;

        const line = `[${new Date().toISOString()}] ${message}\n`;
        try {
            await mkdir(path.dirname(this.filePath), { recursive: true });
            await appendFile(this.filePath, line, 'utf-8');
        } catch (err) {
            this.disabled = true;
            console.error(chalk.yellow(`Activity log disabled: ${(err as Error).message}`));
        }
    }
}
