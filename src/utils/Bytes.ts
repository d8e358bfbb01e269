export class Bytes {
	static toHex(bytes: Uint8Array): string {
		return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('');
	}

	static equals(a: Uint8Array, b: Uint8Array): boolean {
		if (a.length !== b.length) return false;
		for (let i = 0; i < a.length; i++) {
			if (a[i] !== b[i]) return false;
		}
		return true;
	}

	/** Bytewise lexicographic order; a proper prefix sorts first. */
	static compare(a: Uint8Array, b: Uint8Array): number {
		const minLength = Math.min(a.length, b.length);
		for (let i = 0; i < minLength; i++) {
			if (a[i] < b[i]) return -1;
			if (a[i] > b[i]) return 1;
		}
		return a.length - b.length;
	}
}
