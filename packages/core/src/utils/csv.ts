/**
 * CSV parsing utilities.
 */

/**
 * Normalize a header cell for column matching.
 * Strips a UTF-8 Byte Order Mark (\uFEFF) and surrounding whitespace.
 */
export function normalizeHeaderCell(cell: unknown): string {
    const value = String(cell ?? '');
    return (value.startsWith('\uFEFF') ? value.slice(1) : value).trim();
}
