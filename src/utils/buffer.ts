/** Coerces a number to a signed 8-bit integer, wrapping like the wire format does */
export function toInt8(value: number): number {
	return (value << 24) >> 24;
}

export function toUint8(value: number): number {
	return value & 0xff;
}

export function toUint16(value: number): number {
	return value & 0xffff;
}

export function toUint24(value: number): number {
	return value & 0xffffff;
}

/**
 * Compares two byte arrays by content.
 * `null` equals only `null`.
 */
export function bytesEqual(
	a: Uint8Array | null,
	b: Uint8Array | null,
): boolean {
	if (a === null || b === null) {
		return a === b;
	}
	if (a.length !== b.length) {
		return false;
	}
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) {
			return false;
		}
	}
	return true;
}

/**
 * Renders bytes as lower-case hex in array order, without separators.
 *
 * @example
 * ```typescript
 * toHexString(new Uint8Array([0x01, 0xab])); // "01ab"
 * ```
 */
export function toHexString(data: Uint8Array): string {
	let out = "";
	for (const byte of data) {
		out += byte.toString(16).padStart(2, "0");
	}
	return out;
}

/**
 * Renders an unsigned integer as `0x`-prefixed lower-case hex, zero padded
 * to `digits`.
 */
export function toHexNumber(value: number, digits: number): string {
	return `0x${value.toString(16).padStart(digits, "0")}`;
}
