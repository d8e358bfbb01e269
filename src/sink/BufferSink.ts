import { failIf } from '../logger';
import { type ByteSink } from './ByteSink';

/** Growable in-memory sink. Capacity doubles when a write does not fit. */
export class BufferSink implements ByteSink {
	private buffer: Uint8Array;
	private offset = 0;

	constructor(initialCapacity = 256) {
		failIf(
			!Number.isSafeInteger(initialCapacity) || initialCapacity < 0,
			() => new RangeError(`initialCapacity must be a non-negative integer, got ${initialCapacity}`),
		);
		this.buffer = new Uint8Array(Math.max(1, initialCapacity));
	}

	get length(): number {
		return this.offset;
	}

	write(bytes: Uint8Array): void {
		this.grow(bytes.length);
		this.buffer.set(bytes, this.offset);
		this.offset += bytes.length;
	}

	/** Copy of everything written since construction or the last `reset`. */
	bytes(): Uint8Array {
		return this.buffer.slice(0, this.offset);
	}

	reset(): void {
		this.offset = 0;
	}

	private grow(needed: number): void {
		if (this.offset + needed <= this.buffer.length) return;
		let capacity = this.buffer.length;
		while (capacity < this.offset + needed) capacity *= 2;
		const next = new Uint8Array(capacity);
		next.set(this.buffer.subarray(0, this.offset));
		this.buffer = next;
	}
}
