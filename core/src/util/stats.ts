/**
 * Summary statistics over result columns.
 */

export function mean(arr: readonly number[]): number {
  const len = arr.length;
  if (len === 0) return 0;
  let sum = 0;
  for (let i = 0; i < len; i++) sum += arr[i];
  return sum / len;
}

/** Sample standard deviation (n - 1 denominator); 0 below two values. */
export function sampleStd(arr: readonly number[]): number {
  const len = arr.length;
  if (len < 2) return 0;
  const m = mean(arr);
  let sum = 0;
  for (let i = 0; i < len; i++) {
    const d = arr[i] - m;
    sum += d * d;
  }
  return Math.sqrt(sum / (len - 1));
}

export function min(arr: readonly number[]): number {
  let mn = Infinity;
  for (let i = 0; i < arr.length; i++) if (arr[i] < mn) mn = arr[i];
  return arr.length === 0 ? 0 : mn;
}

export function max(arr: readonly number[]): number {
  let mx = -Infinity;
  for (let i = 0; i < arr.length; i++) if (arr[i] > mx) mx = arr[i];
  return arr.length === 0 ? 0 : mx;
}

export function clamp(val: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, val));
}

export function groupBy<T, K>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const bucket = groups.get(k);
    if (bucket) bucket.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}
