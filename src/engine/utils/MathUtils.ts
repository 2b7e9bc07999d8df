export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  sum(values: Iterable<number | undefined>): number {
    let total = 0;
    for (const v of values) total += v ?? 0;
    return total;
  },

  /** Arithmetic mean; 0 for an empty list */
  mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return MathUtils.sum(values) / values.length;
  },

  /** Move `v` toward `target` by at most `step` without overshooting */
  approach(v: number, target: number, step: number): number {
    if (v > target) return Math.max(target, v - step);
    if (v < target) return Math.min(target, v + step);
    return v;
  },
};
