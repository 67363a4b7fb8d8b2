import { invalidParams } from '../shared/index.js';

/** ENDF interpolation law numbers (INT). */
export const INTERPOLATION_LAWS: Record<number, string> = {
  1: 'histogram',
  2: 'lin-lin',
  3: 'lin-log',
  4: 'log-lin',
  5: 'log-log',
  6: 'gamow',
};

export interface InterpolationResult {
  value: number;
  interpolation_method: string;
}

function lawLabel(intLaw: number): string {
  return `${INTERPOLATION_LAWS[intLaw] ?? 'unknown'} (INT=${intLaw})`;
}

function linLin(x1: number, y1: number, x2: number, y2: number, x: number): number {
  if (x2 === x1) return y1;
  return y1 + ((y2 - y1) * (x - x1)) / (x2 - x1);
}

function interpolatePair(
  intLaw: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  x: number,
): InterpolationResult {
  if (intLaw === 1) return { value: y1, interpolation_method: lawLabel(1) };
  if (intLaw === 2) return { value: linLin(x1, y1, x2, y2, x), interpolation_method: lawLabel(2) };

  const logX = intLaw === 3 || intLaw === 5 || intLaw === 6;
  const logY = intLaw === 4 || intLaw === 5 || intLaw === 6;
  const badX = logX && (x1 <= 0 || x2 <= 0 || x <= 0);
  const badY = logY && (y1 <= 0 || y2 <= 0);
  if (badX || badY) {
    return {
      value: linLin(x1, y1, x2, y2, x),
      interpolation_method: 'lin-lin (fallback: log of non-positive)',
    };
  }

  if (intLaw === 3) {
    const value = y1 + ((y2 - y1) * Math.log(x / x1)) / Math.log(x2 / x1);
    return { value, interpolation_method: lawLabel(3) };
  }

  if (intLaw === 4) {
    const value = y1 * Math.exp(((x - x1) / (x2 - x1)) * Math.log(y2 / y1));
    return { value, interpolation_method: lawLabel(4) };
  }

  if (intLaw === 5) {
    const value = y1 * Math.exp((Math.log(x / x1) / Math.log(x2 / x1)) * Math.log(y2 / y1));
    return { value, interpolation_method: lawLabel(5) };
  }

  if (intLaw === 6) {
    // charged-particle penetrability: ln(y*x) linear in 1/sqrt(x)
    const u1 = 1 / Math.sqrt(x1);
    const u2 = 1 / Math.sqrt(x2);
    const u = 1 / Math.sqrt(x);
    const w1 = Math.log(y1 * x1);
    const w2 = Math.log(y2 * x2);
    const w = w1 + ((w2 - w1) * (u - u1)) / (u2 - u1);
    return { value: Math.exp(w) / x, interpolation_method: lawLabel(6) };
  }

  return { value: linLin(x1, y1, x2, y2, x), interpolation_method: `lin-lin (fallback: unknown INT=${intLaw})` };
}

/**
 * One-dimensional tabulated function, the in-memory form of a TAB1 record.
 *
 * `breakpoints[k]` is the 1-based index of the last point of region k and
 * `interpolation[k]` its law. Without breakpoints the whole table is one
 * lin-lin region.
 */
export class Tabulated1D {
  readonly breakpoints: number[];
  readonly interpolation: number[];

  constructor(
    readonly x: number[],
    readonly y: number[],
    breakpoints?: number[],
    interpolation?: number[],
  ) {
    if (x.length !== y.length) {
      throw invalidParams(`Tabulated1D needs as many x as y values (got ${x.length} and ${y.length})`);
    }
    if (breakpoints && interpolation) {
      if (breakpoints.length !== interpolation.length) {
        throw invalidParams('Tabulated1D breakpoints and interpolation laws differ in length');
      }
      this.breakpoints = [...breakpoints];
      this.interpolation = [...interpolation];
    } else {
      this.breakpoints = [x.length];
      this.interpolation = [2];
    }
  }

  get nPairs(): number {
    return this.x.length;
  }

  get nRegions(): number {
    return this.breakpoints.length;
  }

  /** Law governing the bin that ends at the given 1-based point index. */
  lawFor(rightPointIndex: number): number {
    for (let k = 0; k < this.breakpoints.length; k += 1) {
      if (rightPointIndex <= (this.breakpoints[k] ?? 0)) return this.interpolation[k] ?? 2;
    }
    return this.interpolation[this.interpolation.length - 1] ?? 2;
  }

  /** Index of the last tabulated x that is <= `xq`, or -1. */
  private binIndex(xq: number): number {
    let lo = 0;
    let hi = this.x.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.x[mid] ?? Number.POSITIVE_INFINITY) <= xq) lo = mid + 1;
      else hi = mid;
    }
    return lo - 1;
  }

  evaluateWithMethod(xq: number): InterpolationResult {
    const n = this.x.length;
    const firstX = this.x[0];
    const firstY = this.y[0];
    const lastX = this.x[n - 1];
    const lastY = this.y[n - 1];
    if (firstX === undefined || firstY === undefined || lastX === undefined || lastY === undefined) {
      throw invalidParams('Cannot evaluate an empty tabulated function');
    }
    if (xq <= firstX) return { value: firstY, interpolation_method: 'clamped (below range)' };
    if (xq >= lastX) return { value: lastY, interpolation_method: 'clamped (above range)' };

    const i = this.binIndex(xq);
    const x1 = this.x[i] ?? firstX;
    const y1 = this.y[i] ?? firstY;
    const x2 = this.x[i + 1] ?? lastX;
    const y2 = this.y[i + 1] ?? lastY;
    if (x1 === xq) return { value: y1, interpolation_method: 'tabulated point' };
    return interpolatePair(this.lawFor(i + 2), x1, y1, x2, y2, xq);
  }

  evaluate(xq: number): number {
    return this.evaluateWithMethod(xq).value;
  }

  toJSON() {
    return {
      x: this.x,
      y: this.y,
      breakpoints: this.breakpoints,
      interpolation: this.interpolation,
    };
  }
}

/** TAB2 records carry only the interpolation scheme of the outer variable. */
export interface Tabulated2D {
  breakpoints: number[];
  interpolation: number[];
}
