import { describe, it, expect } from 'vitest';
import { describeError, isExchangeError, SlippageError } from '../errors.js';

describe('errors', () => {
    it('describes exchange errors with their code', () => {
        expect(describeError(new SlippageError('MIN_OUTPUT', 'too little'))).toBe('SlippageError[MIN_OUTPUT]: too little');
    });

    it('tells exchange errors apart from plain ones', () => {
        expect(isExchangeError(new SlippageError('PARTIAL_FILL', 'short'))).toBe(true);
        expect(isExchangeError(new Error('boom'))).toBe(false);
    });
});
