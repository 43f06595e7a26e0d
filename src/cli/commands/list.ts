import { Command } from 'commander';
import { bootstrap, type GlobalOptions } from '../bootstrap.js';
import { renderExtensionList } from '../ui/render.js';

export function createListCommand(): Command {
    return new Command('list')
        .description('List the extensions that load cleanly')
        .action(async (_options: unknown, command: Command) => {
            const { registry } = await bootstrap(command.optsWithGlobals<GlobalOptions>());
            renderExtensionList(registry.list());
        });
}
