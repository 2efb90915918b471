export {
	AD_ADDRESS_TYPE_UNDEFINED,
	addressTypeFromAD,
	addressTypeToString,
	adAddressTypeFrom,
	BDAddressType,
	type BDAddressTypeValue,
	EUI48_SIZE,
	eui48ToString,
	parseEUI48,
} from "./address";
export {
	EIR_DATA_MASK_ALL,
	type EIRDataMask,
	EIRDataType,
	type EIRDataTypeBit,
	type EIRDataTypeName,
	eirDataMaskToString,
	eirDataTypeNames,
	isEIRDataTypeSet,
	setEIRDataType,
} from "./eir-data-type";
export { GAPFlags, type GAPFlagName, gapFlagsToString } from "./gap-flags";
export {
	createManufacturerData,
	type ManufacturerData,
	manufacturerDataEquals,
	manufacturerDataToString,
} from "./manufacturer-data";
export {
	type ConnectionInterval,
	cloneReport,
	createReport,
	DEFAULT_LOG_PREFIX,
	type DeviceId,
	type Report,
	type ReportOptions,
	type ReportSource,
	RSSI_NOT_AVAILABLE,
	TX_POWER_NOT_AVAILABLE,
} from "./report";
