#!/usr/bin/env -S node --import tsx
/**
 * Ledger Replay CLI
 *
 * The CLI handles all file I/O:
 * - reads the transaction CSV into memory
 * - core parses, replays and serializes without touching the file system
 * - CLI writes the balances (plus optional report and manifest)
 */

import { run } from './cli.js';
import { error } from './utils/console.js';

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
    });
