import { type ByteSink, writeBytes } from '../sink/ByteSink';
import { type MajorType } from './constants';

/** Byte count of a trailing header payload. */
export type PayloadWidth = 1 | 2 | 4 | 8;

function headerByte(major: MajorType, minor: number): number {
	return (major << 5) | (minor & 0x1f);
}

/** Writes a single `(major << 5) | minor` byte. */
export function writeHeader(sink: ByteSink, major: MajorType, minor: number): void {
	writeBytes(sink, Uint8Array.of(headerByte(major, minor)));
}

/**
 * Writes the header byte followed by `payload` as a big-endian integer of `width` bytes. Header and
 * payload go to the sink in one write.
 */
export function writeHeaderWithPayload(
	sink: ByteSink,
	major: MajorType,
	minor: number,
	payload: number | bigint,
	width: PayloadWidth,
): void {
	const out = new Uint8Array(1 + width);
	const view = new DataView(out.buffer);
	out[0] = headerByte(major, minor);
	switch (width) {
		case 1:
			view.setUint8(1, Number(payload));
			break;
		case 2:
			view.setUint16(1, Number(payload), false);
			break;
		case 4:
			view.setUint32(1, Number(payload), false);
			break;
		case 8:
			view.setBigUint64(1, BigInt(payload), false);
			break;
	}
	writeBytes(sink, out);
}
