/**
 * Field groups of an inquiry/advertising report, one bit each.
 *
 * A mask of these bits serves both as the presence mask of a report and as
 * the change mask returned by a merge.
 */
export const EIRDataType = {
	NONE: 0,
	BDADDR_TYPE: 1 << 2,
	BDADDR: 1 << 3,
	FLAGS: 1 << 4,
	NAME: 1 << 5,
	NAME_SHORT: 1 << 6,
	RSSI: 1 << 7,
	TX_POWER: 1 << 8,
	MANUF_DATA: 1 << 9,
	DEVICE_CLASS: 1 << 10,
	APPEARANCE: 1 << 11,
	DEVICE_ID: 1 << 14,
	CONN_IVAL: 1 << 15,
	SERVICES_COMPLETE: 1 << 16,
	SERVICE_UUID: 1 << 30,
} as const;

export type EIRDataTypeName = Exclude<keyof typeof EIRDataType, "NONE">;

/** A single field group bit */
export type EIRDataTypeBit = (typeof EIRDataType)[EIRDataTypeName];

/** Set of field group bits */
export type EIRDataMask = number;

const BIT_NAMES: readonly EIRDataTypeName[] = [
	"BDADDR_TYPE",
	"BDADDR",
	"FLAGS",
	"NAME",
	"NAME_SHORT",
	"RSSI",
	"TX_POWER",
	"MANUF_DATA",
	"DEVICE_CLASS",
	"APPEARANCE",
	"DEVICE_ID",
	"CONN_IVAL",
	"SERVICES_COMPLETE",
	"SERVICE_UUID",
];

/** Every defined field group bit */
export const EIR_DATA_MASK_ALL: EIRDataMask = BIT_NAMES.reduce<EIRDataMask>(
	(mask, name) => mask | EIRDataType[name],
	0,
);

export function isEIRDataTypeSet(mask: EIRDataMask, bit: EIRDataTypeBit): boolean {
	return (mask & bit) !== 0;
}

export function setEIRDataType(
	mask: EIRDataMask,
	bit: EIRDataTypeBit,
): EIRDataMask {
	return mask | bit;
}

/** Names of the bits in `mask`, lowest bit first. Unknown bits are ignored. */
export function eirDataTypeNames(mask: EIRDataMask): EIRDataTypeName[] {
	return BIT_NAMES.filter((name) => isEIRDataTypeSet(mask, EIRDataType[name]));
}

/**
 * Renders a mask as `[NAME, RSSI]`, lowest bit first.
 *
 * @example
 * ```typescript
 * eirDataMaskToString(EIRDataType.NAME | EIRDataType.RSSI); // "[NAME, RSSI]"
 * eirDataMaskToString(EIRDataType.NONE);                    // "[]"
 * ```
 */
export function eirDataMaskToString(mask: EIRDataMask): string {
	return `[${eirDataTypeNames(mask).join(", ")}]`;
}
