/**
 * ∫_p^q max(0, r − max(y, s)) dy for p ≤ q and s ≤ r.
 *
 * The integrand is the length of [s, r) lying above y: constant r − s while
 * y ≤ s, then a ramp falling to zero at y = r.
 */
export function rampIntegral(p: number, q: number, r: number, s: number): number {
  // Ramp has ended before the range starts
  if (r <= p) return 0;

  // Whole range sits on the flat part
  if (q <= s) return (r - s) * (q - p);

  if (s <= p) {
    // Whole range sits on the ramp
    if (q <= r) return (q - p) * (r - (p + q) / 2);
    // Ramp reaches zero inside the range
    return (r - p) ** 2 / 2;
  }

  // Flat part then ramp, breaking at s
  const end = Math.min(q, r);
  return (r - s) * (s - p) + ((r - s) ** 2 - (r - end) ** 2) / 2;
}
