import { failIf, type Logger, NULL_LOGGER } from '../logger';
import { EncodingRangeError } from '../model/Errors';
import { UINT64_MAX } from '../model/Value';
import { type ByteSink } from '../sink/ByteSink';
import { type MajorType, Minor } from './constants';
import { writeHeader, writeHeaderWithPayload } from './header';

const UINT32_MAX = 0xffff_ffff;

/**
 * Writes `value` under `major` in its shortest form: inline for 0..23, otherwise a 1, 2, 4 or
 * 8-byte big-endian argument. Also used for every length prefix.
 *
 * An out-of-range argument is logged to `logger` at error level, then thrown as
 * {@link EncodingRangeError}.
 */
export function writeInteger(
	sink: ByteSink,
	major: MajorType,
	value: number | bigint,
	logger: Logger = NULL_LOGGER,
): void {
	let n: number;
	if (typeof value === 'bigint') {
		failIf(
			value < 0n || value > UINT64_MAX,
			() => new EncodingRangeError(`Integer argument ${value} is outside [0, 2^64 - 1]`),
			logger,
		);
		if (value > BigInt(UINT32_MAX)) {
			writeHeaderWithPayload(sink, major, Minor.Uint64, value, 8);
			return;
		}
		n = Number(value);
	} else {
		failIf(
			!Number.isInteger(value) || value < 0,
			() => new EncodingRangeError(`Integer argument ${value} is not a non-negative integer`),
			logger,
		);
		if (value > UINT32_MAX) {
			// BigInt() of an integral number is exact, including above 2^53
			writeInteger(sink, major, BigInt(value), logger);
			return;
		}
		n = value;
	}

	if (n <= Minor.MaxInline) {
		writeHeader(sink, major, n);
	} else if (n <= 0xff) {
		writeHeaderWithPayload(sink, major, Minor.Uint8, n, 1);
	} else if (n <= 0xffff) {
		writeHeaderWithPayload(sink, major, Minor.Uint16, n, 2);
	} else {
		writeHeaderWithPayload(sink, major, Minor.Uint32, n, 4);
	}
}
