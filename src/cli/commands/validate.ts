import { Command } from 'commander';
import { findUnboundPlaceholders, type PlaceholderWarning } from '../../extensions/lint.js';
import { bootstrap, type GlobalOptions } from '../bootstrap.js';
import { renderValidationReport } from '../ui/render.js';

export function createValidateCommand(): Command {
    return new Command('validate')
        .description('Check every extension file and report schema errors')
        .action(async (_options: unknown, command: Command) => {
            const { registry, report } = await bootstrap(command.optsWithGlobals<GlobalOptions>());

            const warnings = new Map<string, PlaceholderWarning[]>();
            for (const ext of registry.list()) {
                warnings.set(ext.key, findUnboundPlaceholders(ext));
            }

            renderValidationReport(registry.list(), report.failures, warnings);

            if (report.failures.length > 0) {
                process.exitCode = 1;
            }
        });
}
