/**
 * @file Display Text Sanitization
 *
 * Process names and argument vectors are attacker-influenceable: any
 * process can name itself anything. Everything shown on a terminal
 * passes through here first.
 *
 * @module procfs/text
 */

/** Maximum display width of a command line. */
export const COMMAND_MAX_LENGTH: number = 80;

const ELLIPSIS: string = '...';
const PLACEHOLDER: string = '?';

/**
 * Replace every code point outside printable ASCII (and tab) with `?`,
 * then trim surrounding whitespace.
 */
export function text_sanitize(text: string): string {
    return text.replace(/[^\x20-\x7E\t]/gu, PLACEHOLDER).trim();
}

/**
 * Truncate to `maxLength` characters, ending in `...` when cut.
 */
export function text_truncate(text: string, maxLength: number = COMMAND_MAX_LENGTH): string {
    if (text.length <= maxLength) return text;
    return text.slice(0, Math.max(0, maxLength - ELLIPSIS.length)) + ELLIPSIS;
}
