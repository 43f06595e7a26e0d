#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';

const program = createCLI();

program.parseAsync(process.argv).then(
    () => process.exit(process.exitCode ?? 0),
    (err) => {
        console.error(chalk.red(`linemenu: ${(err as Error).message}`));
        process.exit(1);
    },
);
