/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const HEX_PATTERN = /^[0-9a-f]+$/;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x180f);  // "0000180f-0000-1000-8000-00805f9b34fb"
 * toFullUuid("180a");  // "0000180a-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Brings a 16-, 32- or 128-bit UUID into its canonical 128-bit textual form
 * (lower case, hyphenated). Short forms are expanded against the Bluetooth
 * Base UUID; an optional `0x` prefix is accepted on them.
 *
 * Returns `null` when the text is not a UUID.
 *
 * @example
 * ```typescript
 * toCanonicalUuid("180F");       // "0000180f-0000-1000-8000-00805f9b34fb"
 * toCanonicalUuid("0x0000180f"); // "0000180f-0000-1000-8000-00805f9b34fb"
 * toCanonicalUuid("nope");       // null
 * ```
 */
export function toCanonicalUuid(uuid: string): string | null {
	const normalized = uuid.trim().toLowerCase();

	if (normalized.length === 36) {
		return FULL_UUID_PATTERN.test(normalized) ? normalized : null;
	}

	const hex = normalized.startsWith("0x") ? normalized.slice(2) : normalized;
	if (!HEX_PATTERN.test(hex)) {
		return null;
	}

	if (hex.length <= 4) {
		return toFullUuid(hex);
	}

	if (hex.length <= 8) {
		return `${hex.padStart(8, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	return null;
}
