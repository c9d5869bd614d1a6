/** Format a loop point as `m:ss.s`, or a placeholder when unset. */
export function formatLoopPoint(seconds: number | null | undefined): string {
  if (typeof seconds !== 'number' || !Number.isFinite(seconds)) {
    return '--:--.-';
  }
  const tenths = Math.round(Math.max(0, seconds) * 10);
  const minutes = Math.floor(tenths / 600);
  const remainder = (tenths % 600) / 10;
  return `${minutes}:${remainder.toFixed(1).padStart(4, '0')}`;
}
