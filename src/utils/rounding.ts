// Enough places to hold the exact decimal expansion of any double in the
// ranges these values come from (percentages, hours).
const EXPANSION_DIGITS = 100;

/**
 * Rounds to `digits` decimal places, judging the exact binary value and
 * sending exact ties to the even neighbour: 0.25 -> 0.2, 0.75 -> 0.8,
 * 0.35 (stored as 0.34999...) -> 0.3.
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value)) return value;

  const sign = value < 0 ? -1 : 1;
  const [whole, fraction = ''] = Math.abs(value).toFixed(EXPANSION_DIGITS).split('.');
  const rest = fraction.slice(digits);

  let scaled = BigInt(whole + fraction.slice(0, digits));
  const head = rest.charAt(0);
  const tail = rest.slice(1);
  const aboveHalf = head > '5' || (head === '5' && /[1-9]/.test(tail));
  const exactHalf = head === '5' && !/[1-9]/.test(tail);
  if (aboveHalf || (exactHalf && scaled % 2n === 1n)) scaled += 1n;

  return (sign * Number(scaled)) / 10 ** digits;
}
