import { assertValid } from '../errors.js';

/**
 * A small subset of the `{:spec}` template format for floating-point numbers:
 * `[sign][0][width][.precision][type]`, with sign in `+- ` and type in `fFeEgG%`. Rounding is
 * done on the exact value of the double, and an exact tie rounds to even.
 *
 *   formatNumber('{:.2f}', 1.5)   // '1.50'
 *   formatNumber('x={:+.1e}', 25) // 'x=+2.5e+01'
 */

const kTypes = ['f', 'F', 'e', 'E', 'g', 'G', '%'] as const;

interface FormatSpec {
  readonly sign: '+' | '-' | ' ';
  readonly zeroPad: boolean;
  readonly width: number;
  readonly precision: number | undefined;
  readonly type: (typeof kTypes)[number] | undefined;
}

export interface NumberTemplate {
  readonly prefix: string;
  readonly suffix: string;
  readonly spec: FormatSpec;
}

const kPlaceholder = /\{(?::([^{}]*))?\}/;
const kSpec = /^([+\- ])?(0)?(\d+)?(?:\.(\d+))?([fFeEgG%])?$/;

function parseSpec(text: string): FormatSpec {
  const m = kSpec.exec(text);
  assertValid(m !== null, `Unsupported float format spec '${text}'`);
  const [, sign, zero, width, precision, type] = m;
  return {
    sign: sign === '+' || sign === ' ' ? sign : '-',
    zeroPad: zero !== undefined,
    width: width === undefined ? 0 : Number(width),
    precision: precision === undefined ? undefined : Number(precision),
    type: kTypes.find(t => t === type),
  };
}

/** Parses a template with exactly one `{}` or `{:spec}` placeholder. */
export function parseNumberTemplate(template: string): NumberTemplate {
  const m = kPlaceholder.exec(template);
  assertValid(m !== null, `Float format '${template}' has no {} placeholder`);
  const prefix = template.slice(0, m.index);
  const suffix = template.slice(m.index + m[0].length);
  assertValid(
    !kPlaceholder.test(suffix),
    `Float format '${template}' has more than one {} placeholder`
  );
  return { prefix, suffix, spec: parseSpec(m[1] ?? '') };
}

function withExponentDigits(s: string): string {
  // 1.5e+1 -> 1.5e+01
  return s.replace(/e([+-])(\d)$/, (_, sign: string, digit: string) => `e${sign}0${digit}`);
}

function stripTrailingZeros(s: string): string {
  return s.includes('.') ? s.replace(/\.?0+$/, '') : s;
}

/** `digits / 10 ** scale`, exactly. */
interface ExactDecimal {
  readonly digits: bigint;
  readonly scale: number;
}

/** The exact decimal value of a finite, non-negative double. */
function exactDecimal(x: number): ExactDecimal {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, x);
  const hi = view.getUint32(0);
  const lo = view.getUint32(4);
  const biasedExponent = (hi >>> 20) & 0x7ff;
  let mantissa = (BigInt(hi & 0xfffff) << 32n) | BigInt(lo);
  let exponent = -1074;
  if (biasedExponent !== 0) {
    mantissa |= 1n << 52n;
    exponent = biasedExponent - 1075;
  }
  if (exponent >= 0) {
    return { digits: mantissa << BigInt(exponent), scale: 0 };
  }
  // m / 2^k == m * 5^k / 10^k
  return { digits: mantissa * 5n ** BigInt(-exponent), scale: -exponent };
}

/**
 * Rounds to a multiple of `10 ** -places` (places may be negative), ties to even.
 * Returns the multiplier.
 */
function roundToPlaces({ digits, scale }: ExactDecimal, places: number): bigint {
  if (places >= scale) {
    return digits * 10n ** BigInt(places - scale);
  }
  const unit = 10n ** BigInt(scale - places);
  const q = digits / unit;
  const twice = (digits % unit) * 2n;
  if (twice > unit || (twice === unit && q % 2n === 1n)) {
    return q + 1n;
  }
  return q;
}

function placeDecimalPoint(q: bigint, places: number): string {
  const s = q.toString().padStart(places + 1, '0');
  return places === 0 ? s : `${s.slice(0, -places)}.${s.slice(-places)}`;
}

/** Like `x.toFixed(places)`, but an exact tie rounds to even. */
function toFixedHalfEven(x: number, places: number): string {
  return placeDecimalPoint(roundToPlaces(exactDecimal(x), places), places);
}

/** Like `x.toExponential(precision)`, but an exact tie rounds to even. */
function toExponentialHalfEven(x: number, precision: number): string {
  const d = exactDecimal(x);
  if (d.digits === 0n) {
    return placeDecimalPoint(0n, precision) + 'e+0';
  }
  let exp = d.digits.toString().length - 1 - d.scale;
  let q = roundToPlaces(d, precision - exp);
  if (q.toString().length > precision + 1) {
    // Rounded up to the next power of ten.
    q /= 10n;
    exp++;
  }
  return `${placeDecimalPoint(q, precision)}e${exp < 0 ? '-' : '+'}${Math.abs(exp)}`;
}

/**
 * General format: `precision` significant digits, in fixed-point or exponent notation depending
 * on the exponent, trailing zeros removed. With `keepPointZero` fixed-point output keeps one
 * digit after the point, and exponent notation starts one exponent earlier.
 */
function formatGeneral(x: number, precision: number, keepPointZero: boolean): string {
  const p = precision === 0 ? 1 : precision;
  const [mantissa, exp] = toExponentialHalfEven(x, p - 1).split('e');
  const e = Number(exp);
  if (e >= -4 && e < (keepPointZero ? p - 1 : p)) {
    const fixed = stripTrailingZeros(toFixedHalfEven(x, p - 1 - e));
    return keepPointZero && !fixed.includes('.') ? fixed + '.0' : fixed;
  }
  return withExponentDigits(`${stripTrailingZeros(mantissa)}e${exp}`);
}

function formatMagnitude(x: number, spec: FormatSpec): string {
  if (!Number.isFinite(x)) {
    const text = Number.isNaN(x) ? 'nan' : 'inf';
    return spec.type === 'F' || spec.type === 'E' || spec.type === 'G' ? text.toUpperCase() : text;
  }
  switch (spec.type) {
    case undefined:
      return spec.precision === undefined ? String(x) : formatGeneral(x, spec.precision, true);
    case 'f':
    case 'F':
      return toFixedHalfEven(x, spec.precision ?? 6);
    case 'e':
      return withExponentDigits(toExponentialHalfEven(x, spec.precision ?? 6));
    case 'E':
      return withExponentDigits(toExponentialHalfEven(x, spec.precision ?? 6)).toUpperCase();
    case 'g':
      return formatGeneral(x, spec.precision ?? 6, false);
    case 'G':
      return formatGeneral(x, spec.precision ?? 6, false).toUpperCase();
    case '%':
      return toFixedHalfEven(x * 100, spec.precision ?? 6) + '%';
  }
}

export function applyNumberTemplate(template: NumberTemplate, value: number): string {
  const { spec } = template;
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = formatMagnitude(Math.abs(value), spec);
  const sign = negative ? '-' : spec.sign === '-' ? '' : spec.sign;

  let body: string;
  if (spec.zeroPad && !Number.isNaN(value) && Number.isFinite(value)) {
    body = sign + magnitude.padStart(spec.width - sign.length, '0');
  } else {
    body = (sign + magnitude).padStart(spec.width, ' ');
  }
  return template.prefix + body + template.suffix;
}

export function formatNumber(template: string, value: number): string {
  return applyNumberTemplate(parseNumberTemplate(template), value);
}
