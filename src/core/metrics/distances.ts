/**
 * Wasserstein distances between two Asymmetric Interval Numbers
 *
 * Both quantile functions are piecewise linear in the probability level t,
 * with one break at the mass below the expected value. Splitting [0, 1] at
 * both breaks leaves sub-intervals on which Q_X(t) − Q_Y(t) = A + B·t.
 */

import { AIN } from '../ain/AIN';

/**
 * Sub-interval [start, end] of [0, 1] with Q_X − Q_Y = intercept + slope·t
 */
export interface QuantileSegment {
  start: number;
  end: number;
  intercept: number;
  slope: number;
}

export function quantileSegments(x: AIN, y: AIN): QuantileSegment[] {
  if (x.isDegenerate && y.isDegenerate) {
    return [{ start: 0, end: 1, intercept: x.expected - y.expected, slope: 0 }];
  }

  if (x.isDegenerate) {
    const t2 = y.lowerMass;
    return [
      { start: 0, end: t2, intercept: x.expected - y.lower, slope: -1 / y.alpha },
      { start: t2, end: 1, intercept: x.expected - y.expected + t2 / y.beta, slope: -1 / y.beta },
    ];
  }

  if (y.isDegenerate) {
    const t1 = x.lowerMass;
    return [
      { start: 0, end: t1, intercept: x.lower - y.expected, slope: 1 / x.alpha },
      { start: t1, end: 1, intercept: x.expected - y.expected - t1 / x.beta, slope: 1 / x.beta },
    ];
  }

  // Distances are symmetric, so order the operands by their break points
  const [a, b] = x.lowerMass <= y.lowerMass ? [x, y] : [y, x];
  const t1 = a.lowerMass;
  const t2 = b.lowerMass;

  return [
    { start: 0, end: t1, intercept: a.lower - b.lower, slope: 1 / a.alpha - 1 / b.alpha },
    {
      start: t1,
      end: t2,
      intercept: a.expected - b.lower - t1 / a.beta,
      slope: 1 / a.beta - 1 / b.alpha,
    },
    {
      start: t2,
      end: 1,
      intercept: a.expected - b.expected - t1 / a.beta + t2 / b.beta,
      slope: 1 / a.beta - 1 / b.beta,
    },
  ];
}

function linearIntegral(intercept: number, slope: number, from: number, to: number): number {
  return intercept * (to - from) + (slope / 2) * (to * to - from * from);
}

/**
 * 1-Wasserstein distance: ∫ |Q_X(t) − Q_Y(t)| dt
 */
export function w1(x: AIN, y: AIN): number {
  let distance = 0;
  for (const { start, end, intercept, slope } of quantileSegments(x, y)) {
    const sign = (intercept + slope * start) * (intercept + slope * end);
    if (sign >= 0) {
      distance += Math.abs(linearIntegral(intercept, slope, start, end));
    } else {
      // The difference changes sign at its root inside the segment
      const root = -intercept / slope;
      distance +=
        Math.abs(linearIntegral(intercept, slope, start, root)) +
        Math.abs(linearIntegral(intercept, slope, root, end));
    }
  }
  return distance;
}

/**
 * 2-Wasserstein distance: sqrt(∫ (Q_X(t) − Q_Y(t))² dt)
 */
export function w2(x: AIN, y: AIN): number {
  let squared = 0;
  for (const { start, end, intercept, slope } of quantileSegments(x, y)) {
    squared +=
      intercept ** 2 * (end - start) +
      intercept * slope * (end ** 2 - start ** 2) +
      (slope ** 2 / 3) * (end ** 3 - start ** 3);
  }
  return Math.sqrt(Math.max(0, squared));
}

/**
 * ∞-Wasserstein distance: max |Q_X(t) − Q_Y(t)|, attained at a segment end
 */
export function wInf(x: AIN, y: AIN): number {
  const candidates = quantileSegments(x, y).flatMap(({ start, end, intercept, slope }) => [
    Math.abs(intercept + slope * start),
    Math.abs(intercept + slope * end),
  ]);
  return Math.max(...candidates);
}
