import { IOPromptExecutor } from '../io/executor.js';
import { ReadlineIO } from '../io/line-io.js';
import { ShellCommandRunner } from '../io/runner.js';
import { formatValidationError } from '../extensions/validator.js';
import { ActivityLog } from '../logging/activity-log.js';
import { MenuNavigator } from '../navigator/navigator.js';
import { bootstrap, type GlobalOptions } from './bootstrap.js';
import { renderError, renderLoadFailures } from './ui/render.js';
import { Spinner } from './ui/spinner.js';

/**
 * Interactive session over stdin/stdout
 *
 * Load failures are reported on the console and the session starts with
 * whatever loaded. Resolves to the process exit code.
 */
export async function startSession(options: GlobalOptions): Promise<number> {
    const { settings, registry, report } = await bootstrap(options);
    const log = new ActivityLog(settings.logFile);

    if (report.failures.length > 0) {
        renderLoadFailures(report.failures);
        for (const failure of report.failures) {
            const details = failure.errors.map(formatValidationError).join('; ');
            await log.record(`load failed: ${failure.file}: ${details}`);
        }
    }

    if (registry.size === 0) {
        renderError('No valid extensions found.');
        return 1;
    }

    // ─── Wire the session ───
    const io = new ReadlineIO();
    const runner = new ShellCommandRunner({
        shell: settings.shell,
        spinner: settings.spinner ? new Spinner() : undefined,
    });
    const executor = new IOPromptExecutor({ io, runner, log });
    const navigator = new MenuNavigator({ registry, executor, io, settings, log });

    await log.record(`session start: ${registry.size} extension(s) from ${settings.extensionsDir}`);
    try {
        return await navigator.run();
    } finally {
        io.close();
        await log.record('session end');
    }
}
