import { createHash } from 'node:crypto';

/**
 * SHA-256 of file content, prefixed with 'sha256:'.
 */
export function hashContent(content: Uint8Array): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
