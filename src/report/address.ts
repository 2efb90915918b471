/** Byte length of a Bluetooth device address (EUI-48) */
export const EUI48_SIZE = 6;

const EUI48_PATTERN = /^[0-9a-fA-F]{2}(:[0-9a-fA-F]{2}){5}$/;

/**
 * Bluetooth device address type as tracked by the host.
 */
export const BDAddressType = {
	BDADDR_BREDR: 0x00,
	BDADDR_LE_PUBLIC: 0x01,
	BDADDR_LE_RANDOM: 0x02,
	BDADDR_UNDEFINED: 0xff,
} as const;

export type BDAddressTypeValue = (typeof BDAddressType)[keyof typeof BDAddressType];

/** AD address type reported for an undefined host address type */
export const AD_ADDRESS_TYPE_UNDEFINED = 4;

/**
 * Parses `C0:26:DA:01:DA:B1` into address bytes, least significant byte
 * first as they travel on the wire. Returns `null` for malformed text.
 */
export function parseEUI48(text: string): Uint8Array | null {
	if (!EUI48_PATTERN.test(text)) {
		return null;
	}
	const bytes = new Uint8Array(EUI48_SIZE);
	const parts = text.split(":");
	for (let i = 0; i < EUI48_SIZE; i++) {
		bytes[EUI48_SIZE - 1 - i] = Number.parseInt(parts[i] ?? "0", 16);
	}
	return bytes;
}

/**
 * Renders wire-order address bytes as `C0:26:DA:01:DA:B1`,
 * most significant byte first.
 */
export function eui48ToString(address: Uint8Array): string {
	const parts: string[] = [];
	for (let i = EUI48_SIZE - 1; i >= 0; i--) {
		parts.push((address[i] ?? 0).toString(16).padStart(2, "0").toUpperCase());
	}
	return parts.join(":");
}

/**
 * Maps the raw address type of an LE advertising report to the host
 * address type: 0 is public, 1..3 are random variants (including resolved
 * identities), anything else is undefined.
 */
export function addressTypeFromAD(adAddressType: number): BDAddressTypeValue {
	switch (adAddressType) {
		case 0x00:
			return BDAddressType.BDADDR_LE_PUBLIC;
		case 0x01:
		case 0x02:
		case 0x03:
			return BDAddressType.BDADDR_LE_RANDOM;
		default:
			return BDAddressType.BDADDR_UNDEFINED;
	}
}

/** Inverse of {@link addressTypeFromAD}; BR/EDR maps onto the public value. */
export function adAddressTypeFrom(type: BDAddressTypeValue): number {
	switch (type) {
		case BDAddressType.BDADDR_BREDR:
		case BDAddressType.BDADDR_LE_PUBLIC:
			return 0;
		case BDAddressType.BDADDR_LE_RANDOM:
			return 1;
		case BDAddressType.BDADDR_UNDEFINED:
			return AD_ADDRESS_TYPE_UNDEFINED;
	}
}

export function addressTypeToString(type: BDAddressTypeValue): string {
	switch (type) {
		case BDAddressType.BDADDR_BREDR:
			return "BDADDR_BREDR";
		case BDAddressType.BDADDR_LE_PUBLIC:
			return "BDADDR_LE_PUBLIC";
		case BDAddressType.BDADDR_LE_RANDOM:
			return "BDADDR_LE_RANDOM";
		case BDAddressType.BDADDR_UNDEFINED:
			return "BDADDR_UNDEFINED";
	}
}
