export {
	bytesEqual,
	toHexNumber,
	toHexString,
	toInt8,
	toUint8,
	toUint16,
	toUint24,
} from "./buffer";

export { BLUETOOTH_UUID_BASE, toCanonicalUuid, toFullUuid } from "./uuid";
