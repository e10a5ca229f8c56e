/**
 * Formatted console output helpers.
 * Only `log` writes to stdout, so stdout can be piped as the snapshot CSV.
 */

export function log(message: string): void {
    console.log(message);
}

/**
 * Unprefixed text on stderr, for usage shown alongside an error.
 */
export function logError(message: string): void {
    console.error(message);
}

export function success(message: string): void {
    console.error(`✓ ${message}`);
}

export function warn(message: string): void {
    console.error(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function info(message: string): void {
    console.error(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.error(`→ ${message}`);
}
