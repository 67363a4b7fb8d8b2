import { describe, it, expect } from 'vitest';
import { INTERPOLATION_LAWS, Tabulated1D } from '../endf/tabulated.js';

describe('Tabulated1D', () => {
  it('defaults to a single lin-lin region', () => {
    const f = new Tabulated1D([0, 10], [4, 5]);
    expect(f.breakpoints).toEqual([2]);
    expect(f.interpolation).toEqual([2]);
    expect([0, 2.5, 5, 7.5, 10].map(x => f.evaluate(x))).toEqual([4, 4.25, 4.5, 4.75, 5]);
  });

  it('clamps outside the tabulated range', () => {
    const f = new Tabulated1D([0, 10], [4, 5]);
    expect(f.evaluateWithMethod(-1)).toEqual({ value: 4, interpolation_method: 'clamped (below range)' });
    expect(f.evaluateWithMethod(11)).toEqual({ value: 5, interpolation_method: 'clamped (above range)' });
  });

  it('returns tabulated values at tabulated points', () => {
    const f = new Tabulated1D([1, 2, 3], [10, 20, 30]);
    expect(f.evaluateWithMethod(2)).toEqual({ value: 20, interpolation_method: 'tabulated point' });
  });

  it('holds the left value for histogram regions', () => {
    const f = new Tabulated1D([1, 2, 3], [10, 20, 30], [3], [1]);
    expect(f.evaluate(1.5)).toBe(10);
    expect(f.evaluate(2.5)).toBe(20);
  });

  it('interpolates lin-log (INT=3)', () => {
    const r = new Tabulated1D([1, 100], [0, 2], [2], [3]).evaluateWithMethod(10);
    expect(r.value).toBeCloseTo(1, 12);
    expect(r.interpolation_method).toBe('lin-log (INT=3)');
  });

  it('interpolates log-lin (INT=4)', () => {
    expect(new Tabulated1D([0, 1], [1, 100], [2], [4]).evaluate(0.5)).toBeCloseTo(10, 10);
  });

  it('interpolates log-log (INT=5)', () => {
    expect(new Tabulated1D([1, 4], [1, 16], [2], [5]).evaluate(2)).toBeCloseTo(4, 12);
  });

  it('interpolates gamow (INT=6)', () => {
    const r = new Tabulated1D([1, 4], [1, 0.25], [2], [6]).evaluateWithMethod(2);
    expect(r.value).toBeCloseTo(0.5, 12);
    expect(r.interpolation_method).toBe('gamow (INT=6)');
  });

  it('labels each law with its INTERPOLATION_LAWS name', () => {
    for (const law of [1, 2, 3, 4, 5, 6]) {
      const r = new Tabulated1D([1, 4], [1, 4], [2], [law]).evaluateWithMethod(2);
      expect(r.interpolation_method).toBe(`${INTERPOLATION_LAWS[law]} (INT=${law})`);
    }
    expect(INTERPOLATION_LAWS[5]).toBe('log-log');
  });

  it('falls back to lin-lin when a log law meets a non-positive value', () => {
    const r = new Tabulated1D([1, 2], [0, 2], [2], [5]).evaluateWithMethod(1.5);
    expect(r).toEqual({ value: 1, interpolation_method: 'lin-lin (fallback: log of non-positive)' });
  });

  it('falls back to lin-lin for unknown laws', () => {
    const r = new Tabulated1D([0, 2], [0, 2], [2], [9]).evaluateWithMethod(1);
    expect(r).toEqual({ value: 1, interpolation_method: 'lin-lin (fallback: unknown INT=9)' });
  });

  it('uses the last region\'s law past the final breakpoint', () => {
    const f = new Tabulated1D([1, 2, 3, 4], [1, 2, 3, 4], [2], [1]);
    expect(f.lawFor(4)).toBe(1);
    expect(f.nRegions).toBe(1);
    expect(f.nPairs).toBe(4);
  });

  it('rejects mismatched and empty tables', () => {
    expect(() => new Tabulated1D([1, 2], [1])).toThrow(/as many x as y/);
    expect(() => new Tabulated1D([1], [1], [1, 2], [2])).toThrow(/differ in length/);
    expect(() => new Tabulated1D([], []).evaluate(1)).toThrow(/empty tabulated function/);
  });
});
