import path from 'node:path';
import chalk from 'chalk';
import type { LoadFailure } from '../../extensions/registry.js';
import type { Extension } from '../../extensions/types.js';
import type { PlaceholderWarning } from '../../extensions/lint.js';
import { formatValidationError } from '../../extensions/validator.js';

// Console output for the person running the CLI. Everything here goes to the console,
// never over the user's line link.

function displayFile(file: string): string {
    const relative = path.relative(process.cwd(), file);
    return relative && !relative.startsWith('..') ? relative : file;
}

/**
 * Load failures, printed to stderr before a session starts
 */
export function renderLoadFailures(failures: LoadFailure[]): void {
    for (const failure of failures) {
        console.error(chalk.red(`✗ ${displayFile(failure.file)}`));
        for (const error of failure.errors) {
            console.error(chalk.dim(`    ${formatValidationError(error)}`));
        }
    }
}

/**
 * One line per file, valid and invalid together, in file order
 */
export function renderValidationReport(
    extensions: Extension[],
    failures: LoadFailure[],
    warnings: Map<string, PlaceholderWarning[]>,
): void {
    const rows = [
        ...extensions.map((ext) => ({ file: ext.source, ext, failure: undefined })),
        ...failures.map((failure) => ({ file: failure.file, ext: undefined, failure })),
    ].sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));

    console.log();
    for (const row of rows) {
        if (row.ext) {
            console.log(`${chalk.green('✓')} ${displayFile(row.file)} ${chalk.dim(`(${row.ext.name})`)}`);
            for (const warning of warnings.get(row.ext.key) ?? []) {
                console.log(chalk.yellow(`    ${warning.location}: placeholder ${warning.token} matches no input`));
            }
        } else if (row.failure) {
            console.log(`${chalk.red('✗')} ${displayFile(row.file)}`);
            for (const error of row.failure.errors) {
                console.log(chalk.dim(`    ${formatValidationError(error)}`));
            }
        }
    }

    const summary = `${extensions.length} valid, ${failures.length} invalid`;
    console.log();
    console.log(failures.length > 0 ? chalk.red.bold(summary) : chalk.green.bold(summary));
}

/**
 * Loaded extensions with version and description
 */
export function renderExtensionList(extensions: Extension[]): void {
    if (extensions.length === 0) {
        console.log(chalk.dim('No extensions found.'));
        return;
    }

    console.log(chalk.bold(`\nExtensions (${extensions.length})\n`));
    for (const ext of extensions) {
        const version = ext.version ? chalk.dim(` v${ext.version}`) : '';
        console.log(`  ${chalk.cyan.bold(ext.name)}${version}`);
        console.log(`    ${ext.description}`);
        console.log(chalk.dim(`    ${displayFile(ext.source)}`));
        console.log();
    }
}

/**
 * Fatal CLI error
 */
export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}
