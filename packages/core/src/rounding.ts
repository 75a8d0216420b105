/**
 * Round to `places` decimals with ties going to the even digit, judged on
 * the exact stored value: 6.25 → 6.2, 31.25 → 31.2, 6.35 → 6.3 (6.35 is
 * stored just below the tie).
 */
export function roundHalfEven(value: number, places: number): number {
  // toFixed switches to exponent form from 1e21 up
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const [whole = '0', fraction = ''] = Math.abs(value).toFixed(20).split('.');
  const kept = fraction.slice(0, places);
  const dropped = fraction.slice(places);

  let digits = BigInt(whole + kept);
  const first = dropped.charAt(0);
  const tieBroken = /[1-9]/.test(dropped.slice(1));
  if (first > '5' || (first === '5' && (tieBroken || digits % 2n === 1n))) digits += 1n;

  const rounded = Number(digits) / 10 ** places;
  return value < 0 ? -rounded : rounded;
}
