import { stripNonDigits } from './number_identity';
import { BadRangeFormatError, RangeEndBeforeStartError, RangeTooLargeError } from './errors';

export const DEFAULT_MAX_SPAN = 100;

/**
 * Expands a number or a `start-end` range into digit strings.
 *
 * The end may carry only the trailing digits that vary (`0412345678-681`);
 * the missing leading digits are borrowed from the start. An end that is as
 * long or longer than the start is taken as full width.
 *
 * Every element is zero-padded to the width of the start, ascending.
 * A single number (no dash) is returned as-is, whitespace aside.
 */
export function expand(expr: string, maxSpan: number = DEFAULT_MAX_SPAN): string[] {
    const compact = expr.replace(/\s+/g, '');

    const dash = compact.indexOf('-');
    if (dash === -1) {
        return [compact];
    }

    const startDigits = stripNonDigits(compact.slice(0, dash));
    const endDigits = stripNonDigits(compact.slice(dash + 1));

    if (!startDigits || !endDigits) {
        throw new BadRangeFormatError();
    }

    const endFull = endDigits.length < startDigits.length
        ? startDigits.slice(0, startDigits.length - endDigits.length) + endDigits
        : endDigits;

    // Exact integers: the digit strings may be longer than a double can hold.
    const start = BigInt(startDigits);
    const end = BigInt(endFull);
    if (end < start) {
        throw new RangeEndBeforeStartError();
    }

    const span = end - start + 1n;
    if (span > BigInt(maxSpan)) {
        throw new RangeTooLargeError(maxSpan, span);
    }

    const width = startDigits.length;
    const expanded: string[] = [];
    for (let n = start; n <= end; n++) {
        expanded.push(n.toString().padStart(width, '0'));
    }
    return expanded;
}
