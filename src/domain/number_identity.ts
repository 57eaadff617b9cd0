import { UnsupportedNumberFormatError } from './errors';

/**
 * One number identity seen two ways.
 * - dn:     11 digits, prefixed 41 (routing stores)
 * - target: 10 digits, prefixed 0 (provisioning store, operators)
 */
export interface CanonicalNumber {
    readonly dn: string;
    readonly target: string;
}

const DN_PREFIX = '41';
const TARGET_PREFIX = '0';

export function stripNonDigits(value: string): string {
    return value.replace(/\D+/g, '');
}

/**
 * Classifies a free-text number into its canonical pair.
 * Only the two fixed formats are accepted; anything else throws UnsupportedNumberFormatError.
 */
export function classify(raw: string): CanonicalNumber {
    const digits = stripNonDigits(raw);

    if (digits.length === 10 && digits.startsWith(TARGET_PREFIX)) {
        return { dn: DN_PREFIX + digits.slice(1), target: digits };
    }

    if (digits.length === 11 && digits.startsWith(DN_PREFIX)) {
        return { dn: digits, target: TARGET_PREFIX + digits.slice(2) };
    }

    throw new UnsupportedNumberFormatError(raw);
}

export function targetFromDn(dn: string): string {
    return TARGET_PREFIX + dn.slice(DN_PREFIX.length);
}
