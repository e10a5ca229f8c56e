/**
 * Ledger Replay CLI - Core Types
 */

/**
 * Command-line arguments before defaults and config are applied.
 */
export interface CliArgs {
    input?: string;
    output?: string;
    config?: string;
    report?: string;
    manifest?: string;
    quiet: boolean;
    help: boolean;
}

/**
 * Fully resolved options for one replay. All paths are absolute.
 */
export interface ReplayOptions {
    input: string;
    output: string;
    report?: string;
    manifest?: string;
    /** Print the snapshot CSV to stdout */
    echo: boolean;
    /** Suppress progress output */
    quiet: boolean;
}
