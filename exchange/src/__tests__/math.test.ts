import { describe, it, expect } from 'vitest';
import { applySlippage, calculatePrice, ceilDiv, fromRaw, toRaw } from '../math.js';

describe('math', () => {
    it('rounds division up only when asked', () => {
        expect(ceilDiv(7n, 2n)).toBe(4n);
        expect(ceilDiv(0n, 5n)).toBe(0n);
    });

    it('applies slippage with floor rounding', () => {
        expect(applySlippage(1_000n, 100)).toBe(990n);
        expect(applySlippage(999n, 50)).toBe(994n);
        expect(() => applySlippage(1_000n, 10_001)).toThrow(RangeError);
    });

    it('prices a fill as funding per token', () => {
        expect(calculatePrice(2_000n, 1_000n)).toBe(500_000_000_000_000_000n);
        expect(calculatePrice(0n, 1n)).toBe(0n);
    });

    it('converts decimal strings without float error', () => {
        expect(toRaw('1.25', 18)).toBe(1_250_000_000_000_000_000n);
        expect(fromRaw(1_250_000_000_000_000_000n, 18)).toBe('1.25');
        expect(fromRaw(-5n, 1)).toBe('-0.5');
    });
});
