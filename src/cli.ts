#!/usr/bin/env node
/**
 * mysql-advisor - Command Line Interface
 *
 * Entry point for running a diagnostic report from the command line.
 */

import { fileURLToPath } from 'url';
import { parseArgs } from './cli/args.js';
import type { CliOptions } from './cli/args.js';
import { resolveConnection } from './config/connection.js';
import { readOptionFile } from './config/optionFile.js';
import { runAdvisor } from './advisor/Advisor.js';
import { AdvisorError } from './types/index.js';
import { logger } from './utils/logger.js';

/**
 * Print a fatal error and exit with status 1
 */
function fail(error: unknown): never {
    if (error instanceof AdvisorError) {
        console.error(`Error: ${error.message}`);
        if (error.code === 'AUTHENTICATION_ERROR') {
            console.error('Supply credentials with --mysql-user/--mysql-password or --defaults-file');
        }
        logger.debug('Fatal error details', { code: error.code, details: error.details });
    } else {
        logger.error('Fatal error', {
            error: error instanceof Error ? error.stack ?? error.message : String(error)
        });
    }
    process.exit(1);
}

/**
 * Main entry point
 */
export async function main(
    args?: {
        options: CliOptions;
        shouldExit?: boolean;
    }
): Promise<void> {
    let parsed: { options: CliOptions; shouldExit?: boolean };
    try {
        parsed = args ?? parseArgs();
    } catch (error) {
        fail(error);
    }

    const { options, shouldExit } = parsed;
    if (shouldExit) {
        process.exit(0);
    }

    if (options.logLevel) {
        logger.setLevel(options.logLevel);
    }

    let report: string;
    try {
        const optionFile = await readOptionFile(options.defaultsFile);
        const connection = resolveConnection(options.connection, optionFile);

        report = await runAdvisor({
            connection,
            forceMemoryMiB: options.forceMemoryMiB,
            report: options.report
        });
    } catch (error) {
        fail(error);
    }

    process.stdout.write(report);
}

// Only run if this file is the main module
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
    main().catch((error: unknown) => {
        fail(error);
    });
}
