import { bytesEqual, toHexNumber, toHexString, toUint16 } from "../utils/buffer";

/**
 * Manufacturer specific data: one company identifier and its raw payload.
 */
export interface ManufacturerData {
	/** Bluetooth SIG assigned company identifier (16-bit) */
	readonly company: number;
	/** Payload following the company identifier, possibly empty */
	readonly data: Uint8Array;
}

/** Creates a detached copy; the payload is never shared with the caller. */
export function createManufacturerData(
	company: number,
	data?: Uint8Array,
): ManufacturerData {
	return {
		company: toUint16(company),
		data: data ? Uint8Array.from(data) : new Uint8Array(0),
	};
}

export function manufacturerDataEquals(
	a: ManufacturerData | null,
	b: ManufacturerData | null,
): boolean {
	if (a === null || b === null) {
		return a === b;
	}
	return a.company === b.company && bytesEqual(a.data, b.data);
}

export function manufacturerDataToString(msd: ManufacturerData | null): string {
	if (msd === null) {
		return "MSD[null]";
	}
	return `MSD[company ${toHexNumber(msd.company, 4)}, data[${toHexString(msd.data)}]]`;
}
