import { Command } from 'commander';
import chalk from 'chalk';
import { createListCommand } from './commands/list.js';
import { createValidateCommand } from './commands/validate.js';
import type { GlobalOptions } from './bootstrap.js';
import { startSession } from './session.js';

export const VERSION = '0.3.0';

/**
 * Build the linemenu command tree. With no subcommand it starts a session.
 */
export function createCLI(): Command {
    const program = new Command('linemenu')
        .description('Line-oriented menus and commands from YAML extensions')
        .version(VERSION)
        .option('-s, --settings <file>', 'Application settings file (default: ./appsettings.yml)')
        .option('-e, --extensions <dir>', 'Directory of extension .yml files')
        .option('--plain', 'Never colour console output')
        .hook('preAction', (thisCommand) => {
            if (thisCommand.opts<GlobalOptions>().plain) {
                chalk.level = 0;
            }
        })
        .action(async (options: GlobalOptions) => {
            process.exitCode = await startSession(options);
        });

    program.addCommand(createValidateCommand());
    program.addCommand(createListCommand());

    return program;
}
