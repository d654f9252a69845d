export type RandomSource = () => number;

export function roundTo(value: number, decimals = 2): number {
  return Number(value.toFixed(decimals));
}

export function generateSensorValue(
  min: number,
  max: number,
  decimals = 2,
  random: RandomSource = Math.random
): number {
  const value = min + random() * (max - min);
  return roundTo(value, decimals);
}

/**
 * Uniform sample in [lower, upper]. A reversed pair is swapped and negative
 * bounds clamp to zero.
 */
export function sampleInterval(
  lower: number,
  upper: number,
  random: RandomSource = Math.random
): number {
  const lo = Math.max(0, Math.min(lower, upper));
  const hi = Math.max(0, Math.max(lower, upper));
  return lo + random() * (hi - lo);
}

const pad = (value: number) => String(value).padStart(2, '0');

// Local time, `YYYY-MM-DD HH:mm:ss`
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
