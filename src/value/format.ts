const PRECISION = 6;

interface Rounded {
  /** PRECISION significant digits, no decimal point */
  digits: string;
  /** Decimal exponent of the first digit */
  exp: number;
}

function stripZeros(digits: string): string {
  if (!digits.includes(".")) return digits;
  return digits.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * The digits of `ax` when it lies exactly halfway between two
 * PRECISION-digit results, e.g. 12345.25. Null otherwise.
 */
function exactTie(ax: number): { digits: string; exp: number } | null {
  // Shortest round-trip form: an exact tie prints as exactly PRECISION + 1 digits
  const [mantissa = "", expPart] = ax.toExponential().split("e");
  const digits = mantissa.replace(".", "");
  if (digits.length !== PRECISION + 1 || !digits.endsWith("5")) return null;

  const exp = Number(expPart);
  const scale = exp - PRECISION;
  const n = BigInt(digits);

  if (scale >= 0) {
    if (!Number.isInteger(ax) || BigInt(ax) !== n * 10n ** BigInt(scale)) return null;
  } else {
    // n / 10^k is a double only when 5^k divides n
    const fives = 5n ** BigInt(-scale);
    if (n % fives !== 0n) return null;
    if (ax * 2 ** -scale !== Number(n / fives)) return null;
  }

  return { digits, exp };
}

function roundDigits(ax: number): Rounded {
  // toExponential rounds ties away from zero; %g rounds them to even
  const tie = exactTie(ax);
  if (tie !== null && Number(tie.digits[PRECISION - 1]) % 2 === 0) {
    return { digits: tie.digits.slice(0, PRECISION), exp: tie.exp };
  }

  // Rounds first, so 999999.5 lands on exponent 6
  const [mantissa = "", expPart] = ax.toExponential(PRECISION - 1).split("e");
  return { digits: mantissa.replace(".", ""), exp: Number(expPart) };
}

/**
 * Format a number like printf's `%g`: six significant digits, exponent
 * notation when the exponent is below -4 or at least the precision,
 * trailing zeros removed, halfway cases rounded to even.
 */
export function formatGeneral(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (x === Infinity) return "inf";
  if (x === -Infinity) return "-inf";
  if (x === 0) return Object.is(x, -0) ? "-0" : "0";

  const sign = x < 0 ? "-" : "";
  const { digits, exp } = roundDigits(Math.abs(x));

  if (exp < -4 || exp >= PRECISION) {
    const mantissa = stripZeros(`${digits.slice(0, 1)}.${digits.slice(1)}`);
    const expSign = exp < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exp)).padStart(2, "0");
    return `${sign}${mantissa}e${expSign}${magnitude}`;
  }

  if (exp < 0) {
    return sign + stripZeros(`0.${"0".repeat(-exp - 1)}${digits}`);
  }

  const whole = digits.slice(0, exp + 1);
  const fraction = digits.slice(exp + 1);
  return sign + (fraction ? stripZeros(`${whole}.${fraction}`) : whole);
}
