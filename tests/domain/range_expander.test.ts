import { expand } from '../../src/domain/range_expander';
import {
    BadRangeFormatError,
    RangeEndBeforeStartError,
    RangeTooLargeError,
} from '../../src/domain/errors';

describe('RangeExpander', () => {
    describe('Single numbers', () => {
        test('returns the number unchanged', () => {
            expect(expand('0412345678')).toEqual(['0412345678']);
        });

        test('strips whitespace but applies no digit normalization', () => {
            expect(expand(' 041 234 5678 ')).toEqual(['0412345678']);
            expect(expand('+41 41 234 56 78')).toEqual(['+41412345678']);
        });
    });

    describe('Ranges', () => {
        test('short end borrows leading digits from the start', () => {
            expect(expand('0412345678-681')).toEqual([
                '0412345678',
                '0412345679',
                '0412345680',
                '0412345681',
            ]);
        });

        test('full-width end', () => {
            expect(expand('0412345678 - 0412345680')).toEqual(['0412345678', '0412345679', '0412345680']);
        });

        test('end longer than start is taken as full width', () => {
            expect(expand('0412345678-00412345679')).toEqual(['0412345678', '0412345679']);
        });

        test('preserves leading zeros across a carry', () => {
            expect(expand('0000000009-11')).toEqual(['0000000009', '0000000010', '0000000011']);
        });

        test('start equal to end yields one element', () => {
            expect(expand('0412345678-8')).toEqual(['0412345678']);
        });
    });

    describe('Long digit strings', () => {
        test('20-digit range keeps exact values and terminates', () => {
            expect(expand('04123456780000000000-00000001')).toEqual([
                '04123456780000000000',
                '04123456780000000001',
            ]);
        });

        test('REJECT: 20-digit range past the ceiling', () => {
            expect(() => expand('04123456780000000000-04123456780000000100')).toThrow(RangeTooLargeError);
        });
    });

    describe('Span ceiling', () => {
        test('ALLOW: span of exactly 100', () => {
            const result = expand('0412345600-699');
            expect(result).toHaveLength(100);
            expect(result[0]).toBe('0412345600');
            expect(result[99]).toBe('0412345699');
        });

        test('REJECT: span of 101', () => {
            expect(() => expand('0412345600-700')).toThrow(RangeTooLargeError);
            expect(() => expand('0412345600-700')).toThrow('Range too large (>100)');
        });

        test('honors a custom ceiling', () => {
            expect(() => expand('0412345678-681', 3)).toThrow(RangeTooLargeError);
            expect(expand('0412345678-680', 3)).toHaveLength(3);
        });
    });

    describe('Malformed ranges', () => {
        test('REJECT: end before start', () => {
            expect(() => expand('0412345681-678')).toThrow(RangeEndBeforeStartError);
        });

        test('REJECT: empty start', () => {
            expect(() => expand('-681')).toThrow(BadRangeFormatError);
        });

        test('REJECT: empty end', () => {
            expect(() => expand('0412345678-')).toThrow(BadRangeFormatError);
        });

        test('REJECT: end without digits', () => {
            expect(() => expand('0412345678-abc')).toThrow(BadRangeFormatError);
        });
    });
});
