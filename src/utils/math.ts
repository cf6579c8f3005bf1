/**
 * Average of the values; 0 for an empty list. The sum is compensated
 * (Neumaier) so large terms that cancel do not swallow small ones.
 */
export function mean(values: readonly number[]): number {
  let sum = 0;
  let compensation = 0;
  for (const v of values) {
    const t = sum + v;
    compensation += Math.abs(sum) >= Math.abs(v) ? sum - t + v : v - t + sum;
    sum = t;
  }
  return (sum + compensation) / Math.max(values.length, 1);
}

/** Round to a number of decimal places; 0 rounds to an integer */
export function roundTo(value: number, decimals: number): number {
  if (decimals <= 0) return Math.round(value);
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Render a computed number without floating-point noise (0.30000000000000004 -> "0.3") */
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}

export function degreesToRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}
