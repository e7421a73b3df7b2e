#!/usr/bin/env node

// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { registerBundleCommands } from './commands/bundle';
import { registerConfigCommands } from './commands/config';
import { LogLevel, setLogLevel } from './utils/logger';

dotenv.config();

const program = new Command();

program
    .name('tpmtb')
    .description('TPM Trust Bundle: build, verify and consume TPM root certificate bundles')
    .version('0.1.0')
    .option('-v, --verbose', 'Verbose output on stderr')
    .hook('preAction', thisCommand => {
        if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
            setLogLevel(LogLevel.VERBOSE);
        }
    });

registerBundleCommands(program);
registerConfigCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});

// If no arguments provided, show help
if (!process.argv.slice(2).length) {
    program.outputHelp();
}
