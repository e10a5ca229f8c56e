import type { AccountSnapshot, ParseResult } from '@ledger-replay/shared';
import type { Ledger } from '@ledger-replay/core';
import type { ReplayOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the replay pipeline.
 */
export interface PipelineState {
    options: ReplayOptions;

    // Accumulated during pipeline execution
    input?: Uint8Array;
    inputHash?: string;
    parseResult?: ParseResult;
    ledger?: Ledger;
    snapshots: AccountSnapshot[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
