#!/usr/bin/env node

import chalk from 'chalk';
import { createCLI } from '../src/cli/index.js';
import { errorMessage } from '../src/errors.js';

// No command → interactive mode; see the root action
createCLI().parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exit(1);
});
