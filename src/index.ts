/**
 * inquiry-report-kit - Field-presence-tracked Bluetooth discovery reports.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { createReport, EIRDataType, isEIRDataTypeSet } from 'inquiry-report-kit';
 *
 * const stored = createReport();
 * stored.setSource('advertisement');
 * stored.setAddress('C0:26:DA:01:DA:B1');
 * stored.setName('Thermo-1');
 *
 * const update = createReport();
 * update.setRSSI(-55);
 * update.addService('180f');
 *
 * const changed = stored.merge(update);
 * console.log(isEIRDataTypeSet(changed, EIRDataType.RSSI)); // true
 * ```
 */

// Errors
export {
	InternalError,
	InvalidArgumentError,
	isInvalidArgumentError,
} from "./errors";
// Report
export {
	AD_ADDRESS_TYPE_UNDEFINED,
	addressTypeFromAD,
	addressTypeToString,
	adAddressTypeFrom,
	BDAddressType,
	type BDAddressTypeValue,
	type ConnectionInterval,
	cloneReport,
	createManufacturerData,
	createReport,
	DEFAULT_LOG_PREFIX,
	type DeviceId,
	EIR_DATA_MASK_ALL,
	type EIRDataMask,
	EIRDataType,
	type EIRDataTypeBit,
	type EIRDataTypeName,
	EUI48_SIZE,
	eirDataMaskToString,
	eirDataTypeNames,
	eui48ToString,
	type GAPFlagName,
	GAPFlags,
	gapFlagsToString,
	isEIRDataTypeSet,
	type ManufacturerData,
	manufacturerDataEquals,
	manufacturerDataToString,
	parseEUI48,
	type Report,
	type ReportOptions,
	type ReportSource,
	RSSI_NOT_AVAILABLE,
	setEIRDataType,
	TX_POWER_NOT_AVAILABLE,
} from "./report";
// Utils
export {
	BLUETOOTH_UUID_BASE,
	bytesEqual,
	toCanonicalUuid,
	toFullUuid,
	toHexNumber,
	toHexString,
	toInt8,
	toUint8,
	toUint16,
	toUint24,
} from "./utils";
