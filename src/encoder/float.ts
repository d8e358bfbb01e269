import { type ByteSink } from '../sink/ByteSink';
import { MajorType, Minor } from './constants';
import { writeHeaderWithPayload } from './header';

/*
 * Float minimization
 *
 * A float64 is 1 sign bit, an 11-bit exponent biased by 1023 and a 52-bit mantissa. A narrower
 * format can hold the value exactly when the unbiased exponent is in its range and every mantissa
 * bit it would drop is zero, i.e. the mantissa has at least (52 - narrow mantissa bits) trailing
 * zeros.
 *
 *   format    exp bits  mantissa  normal exponents   subnormal exponents
 *   float16   5         10        -14..15            -24..-15
 *   float32   8         23        -126..127          -149..-127
 *
 * A value below the normal range of the narrow format is still exact as a subnormal when its full
 * significand (implicit one included) is a multiple of the format's smallest subnormal.
 *
 * Zero, infinities and NaN are always float16. NaN payloads are not preserved: every NaN becomes the
 * quiet NaN 0x7e00 with its sign bit kept.
 */

const FLOAT64_MANTISSA_BITS = 52;
const FLOAT64_EXP_BIAS = 1023;

const FLOAT16_MANTISSA_BITS = 10;
const FLOAT16_EXP_BIAS = 15;
const FLOAT16_EXP_MAX = 0x1f;
const FLOAT16_QUIET_NAN = 0x200;
const FLOAT16_MIN_EXP = -14;
const FLOAT16_MAX_EXP = 15;
// 2^-24
const FLOAT16_MIN_SUBNORMAL_EXP = FLOAT16_MIN_EXP - FLOAT16_MANTISSA_BITS;

const FLOAT32_MANTISSA_BITS = 23;
const FLOAT32_MIN_EXP = -126;
const FLOAT32_MAX_EXP = 127;
// 2^-149
const FLOAT32_MIN_SUBNORMAL_EXP = FLOAT32_MIN_EXP - FLOAT32_MANTISSA_BITS;

export type FloatWidth = 16 | 32 | 64;

/** The chosen width and the raw IEEE-754 bits to write for it. */
export type MinimizedFloat =
	| { width: 16; bits: number }
	| { width: 32; bits: number }
	| { width: 64; bits: bigint };

function countTrailingZeros32(x: number): number {
	return 31 - Math.clz32(x & -x);
}

/** Trailing zeros of the 52-bit mantissa split into its high 20 and low 32 bits. Capped at 52. */
function mantissaTrailingZeros(high: number, low: number): number {
	if (low !== 0) return countTrailingZeros32(low);
	if (high !== 0) return 32 + countTrailingZeros32(high);
	return FLOAT64_MANTISSA_BITS;
}

function float16(sign: number, exponent: number, mantissa: number): MinimizedFloat {
	return { width: 16, bits: (sign << 15) | (exponent << FLOAT16_MANTISSA_BITS) | mantissa };
}

/**
 * Number of low significand bits that must be zero for a value with unbiased exponent `exp` to be
 * a multiple of `2^minSubnormalExp`.
 */
function subnormalShift(exp: number, minSubnormalExp: number): number {
	return FLOAT64_MANTISSA_BITS - (exp - minSubnormalExp);
}

/**
 * Picks the narrowest of float16, float32 and float64 that reproduces `value` bit for bit (NaN
 * payloads aside).
 */
export function minimizeFloat(value: number): MinimizedFloat {
	const view = new DataView(new ArrayBuffer(8));
	view.setFloat64(0, value, false);
	const high = view.getUint32(0, false);
	const low = view.getUint32(4, false);
	const sign = high >>> 31;

	if (value === 0) return float16(sign, 0, 0);
	if (Number.isNaN(value)) return float16(sign, FLOAT16_EXP_MAX, FLOAT16_QUIET_NAN);
	if (!Number.isFinite(value)) return float16(sign, FLOAT16_EXP_MAX, 0);

	const exp = ((high >>> 20) & 0x7ff) - FLOAT64_EXP_BIAS;
	const mantissaHigh = high & 0xfffff;
	const trailingZeros = mantissaTrailingZeros(mantissaHigh, low);

	if (
		exp >= FLOAT16_MIN_EXP &&
		exp <= FLOAT16_MAX_EXP &&
		trailingZeros >= FLOAT64_MANTISSA_BITS - FLOAT16_MANTISSA_BITS
	) {
		return float16(sign, exp + FLOAT16_EXP_BIAS, mantissaHigh >>> 10);
	}

	if (exp >= FLOAT16_MIN_SUBNORMAL_EXP && exp < FLOAT16_MIN_EXP) {
		const shift = subnormalShift(exp, FLOAT16_MIN_SUBNORMAL_EXP);
		if (trailingZeros >= shift) {
			// significand < 2^53, exact as a double
			const significand = (0x100000 + mantissaHigh) * 2 ** 32 + low;
			return float16(sign, 0, significand / 2 ** shift);
		}
	}

	const fitsFloat32 =
		(exp >= FLOAT32_MIN_EXP &&
			exp <= FLOAT32_MAX_EXP &&
			trailingZeros >= FLOAT64_MANTISSA_BITS - FLOAT32_MANTISSA_BITS) ||
		(exp >= FLOAT32_MIN_SUBNORMAL_EXP &&
			exp < FLOAT32_MIN_EXP &&
			trailingZeros >= subnormalShift(exp, FLOAT32_MIN_SUBNORMAL_EXP));
	if (fitsFloat32) {
		// exact by the checks above, so the native narrowing does not round
		view.setFloat32(0, value, false);
		return { width: 32, bits: view.getUint32(0, false) };
	}

	return { width: 64, bits: view.getBigUint64(0, false) };
}

/** Writes `value` as a major type 7 float of the narrowest exact width. */
export function writeFloat(sink: ByteSink, value: number): void {
	const minimized = minimizeFloat(value);
	switch (minimized.width) {
		case 16:
			writeHeaderWithPayload(sink, MajorType.SimpleValue, Minor.Float16, minimized.bits, 2);
			break;
		case 32:
			writeHeaderWithPayload(sink, MajorType.SimpleValue, Minor.Float32, minimized.bits, 4);
			break;
		case 64:
			writeHeaderWithPayload(sink, MajorType.SimpleValue, Minor.Float64, minimized.bits, 8);
			break;
	}
}
