import { InternalError, InvalidArgumentError } from "../errors";
import {
	bytesEqual,
	toHexNumber,
	toInt8,
	toUint8,
	toUint16,
	toUint24,
} from "../utils/buffer";
import { toCanonicalUuid } from "../utils/uuid";
import {
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
import {
	type EIRDataMask,
	EIRDataType,
	type EIRDataTypeBit,
	eirDataMaskToString as maskToString,
	isEIRDataTypeSet,
	setEIRDataType,
} from "./eir-data-type";
import { gapFlagsToString } from "./gap-flags";
import {
	createManufacturerData,
	type ManufacturerData,
	manufacturerDataEquals,
	manufacturerDataToString,
} from "./manufacturer-data";

/**
 * Protocol that produced a report.
 * - 'unset': not known yet
 * - 'advertisement': LE advertising or scan response data
 * - 'inquiry-response': Classic extended inquiry response
 */
export type ReportSource = "unset" | "advertisement" | "inquiry-response";

/** Device ID profile record, copied and compared as one unit */
export interface DeviceId {
	readonly source: number;
	readonly vendor: number;
	readonly product: number;
	readonly version: number;
}

/**
 * Peripheral connection interval range, in units of 1.25ms.
 * Valid wire values are 6..3200 (7.5ms..4s), 0xffff meaning no bound.
 */
export interface ConnectionInterval {
	readonly min: number;
	readonly max: number;
}

/** RSSI and TX power value while the field is absent */
export const RSSI_NOT_AVAILABLE = -128;
export const TX_POWER_NOT_AVAILABLE = -128;

export const DEFAULT_LOG_PREFIX = "[inquiry-report-kit]";

export interface ReportOptions {
	/** Monotonic clock in milliseconds (default: performance.now) */
	now?: () => number;
	/** Log prefix for warning messages */
	logPrefix?: string;
}

/**
 * Discovery metadata of one device, assembled from advertising and
 * inquiry response packets.
 *
 * Every setter marks its field group in the presence mask and stamps the
 * report with the current time. Getters never fail: absent fields read as
 * zero, empty, `null` or the not-available sentinel, so check
 * {@link Report.isSet} where the difference matters.
 *
 * Not synchronized; the owner serializes writers.
 */
export interface Report {
	getSource(): ReportSource;
	setSource(source: ReportSource): void;
	getTimestamp(): number;
	setTimestamp(timestamp: number): void;

	getEIRDataMask(): EIRDataMask;
	isSet(bit: EIRDataTypeBit): boolean;

	getAddressType(): BDAddressTypeValue;
	setAddressType(type: BDAddressTypeValue): void;
	getADAddressType(): number;
	setADAddressType(adAddressType: number): void;

	/** Address bytes, least significant first. All zero while absent. */
	getAddress(): Uint8Array;
	/** @throws {InvalidArgumentError} for fewer than 6 bytes or malformed text */
	setAddress(address: Uint8Array | string): void;
	getAddressString(): string;

	getRSSI(): number;
	setRSSI(rssi: number): void;
	getTxPower(): number;
	setTxPower(txPower: number): void;

	getFlags(): number;
	setFlags(flags: number): void;
	addFlags(flags: number): void;

	getName(): string;
	setName(name: string): void;
	getShortName(): string;
	setShortName(name: string): void;

	getManufacturerData(): ManufacturerData | null;
	setManufacturerData(company: number, data?: Uint8Array): void;

	/** Canonical 128-bit UUIDs in order of first appearance */
	getServices(): string[];
	hasService(uuid: string): boolean;
	/** @throws {InvalidArgumentError} when `uuid` is not a UUID */
	addService(uuid: string): void;
	getServicesComplete(): boolean;
	setServicesComplete(complete: boolean): void;

	getDeviceClass(): number;
	setDeviceClass(deviceClass: number): void;
	getAppearance(): number;
	setAppearance(appearance: number): void;

	getDeviceID(): DeviceId;
	setDeviceID(
		source: number,
		vendor: number,
		product: number,
		version: number,
	): void;
	/** Linux modalias of the device ID, e.g. `bluetooth:v005Dp0001d0100` */
	getDeviceIDModalias(): string;

	getConnInterval(): ConnectionInterval;
	setConnInterval(min: number, max: number): void;

	/**
	 * Folds the fields present in `other` into this report.
	 * @returns the field groups that changed
	 */
	merge(other: Report): EIRDataMask;
	/** Resets every field, the presence mask and the source */
	clear(): void;

	eirDataMaskToString(): string;
	toString(includeServices?: boolean): string;
}

interface ReportFields {
	mask: EIRDataMask;
	source: ReportSource;
	timestamp: number;
	addressType: BDAddressTypeValue;
	adAddressType: number;
	address: Uint8Array;
	rssi: number;
	txPower: number;
	flags: number;
	name: string;
	shortName: string;
	msd: ManufacturerData | null;
	services: string[];
	servicesComplete: boolean;
	deviceClass: number;
	appearance: number;
	deviceId: DeviceId;
	connInterval: ConnectionInterval;
}

const EMPTY_DEVICE_ID: DeviceId = Object.freeze({
	source: 0,
	vendor: 0,
	product: 0,
	version: 0,
});
const EMPTY_CONN_INTERVAL: ConnectionInterval = Object.freeze({
	min: 0,
	max: 0,
});

function emptyFields(timestamp: number): ReportFields {
	return {
		mask: EIRDataType.NONE,
		source: "unset",
		timestamp,
		addressType: BDAddressType.BDADDR_UNDEFINED,
		adAddressType: AD_ADDRESS_TYPE_UNDEFINED,
		address: new Uint8Array(EUI48_SIZE),
		rssi: RSSI_NOT_AVAILABLE,
		txPower: TX_POWER_NOT_AVAILABLE,
		flags: 0,
		name: "",
		shortName: "",
		msd: null,
		services: [],
		servicesComplete: false,
		deviceClass: 0,
		appearance: 0,
		deviceId: EMPTY_DEVICE_ID,
		connInterval: EMPTY_CONN_INTERVAL,
	};
}

function hex4(value: number): string {
	return value.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Creates an empty report: no field present, source 'unset', stamped with
 * the current time.
 *
 * @example Folding a scan response into the stored report
 * ```typescript
 * const stored = createReport();
 * stored.setSource('advertisement');
 * stored.setName('Thermo-1');
 * stored.setRSSI(-60);
 *
 * const update = createReport();
 * update.setRSSI(-55);
 *
 * const changed = stored.merge(update);
 * if (isEIRDataTypeSet(changed, EIRDataType.RSSI)) {
 *   notifyObservers(stored);
 * }
 * ```
 */
export function createReport(options: ReportOptions = {}): Report {
	const now = options.now ?? (() => performance.now());
	const logPrefix = options.logPrefix ?? DEFAULT_LOG_PREFIX;
	let fields = emptyFields(now());

	function mark(bit: EIRDataTypeBit): void {
		fields.mask = setEIRDataType(fields.mask, bit);
	}

	function touch(bit: EIRDataTypeBit): void {
		mark(bit);
		fields.timestamp = now();
	}

	function storeAddressType(
		type: BDAddressTypeValue,
		adAddressType: number,
	): void {
		fields.addressType = type;
		fields.adAddressType = adAddressType;
		mark(EIRDataType.BDADDR_TYPE);
	}

	function storeService(canonical: string): boolean {
		if (fields.services.includes(canonical)) {
			return false;
		}
		fields.services.push(canonical);
		mark(EIRDataType.SERVICE_UUID);
		return true;
	}

	function requireString(
		argument: string,
		value: unknown,
	): asserts value is string {
		if (typeof value !== "string") {
			throw new InvalidArgumentError(
				argument,
				`expected a string, got ${value === null ? "null" : typeof value}`,
			);
		}
	}

	const report: Report = {
		getSource: () => fields.source,
		setSource(source) {
			fields.source = source;
		},
		getTimestamp: () => fields.timestamp,
		setTimestamp(timestamp) {
			fields.timestamp = timestamp;
		},

		getEIRDataMask: () => fields.mask,
		isSet: (bit) => isEIRDataTypeSet(fields.mask, bit),

		getAddressType: () => fields.addressType,
		setAddressType(type) {
			storeAddressType(type, adAddressTypeFrom(type));
			fields.timestamp = now();
		},
		getADAddressType: () => fields.adAddressType,
		setADAddressType(adAddressType) {
			const raw = toUint8(adAddressType);
			storeAddressType(addressTypeFromAD(raw), raw);
			fields.timestamp = now();
		},

		getAddress: () => fields.address.slice(),
		setAddress(address) {
			let bytes: Uint8Array;
			if (typeof address === "string") {
				const parsed = parseEUI48(address);
				if (parsed === null) {
					throw new InvalidArgumentError(
						"address",
						`malformed address '${address}'`,
					);
				}
				bytes = parsed;
			} else if (address instanceof Uint8Array) {
				if (address.length < EUI48_SIZE) {
					throw new InvalidArgumentError(
						"address",
						`byte size ${address.length} < ${EUI48_SIZE}`,
					);
				}
				bytes = address.slice(0, EUI48_SIZE);
			} else {
				throw new InvalidArgumentError("address", "address null");
			}
			fields.address = bytes;
			touch(EIRDataType.BDADDR);
		},
		getAddressString: () => eui48ToString(fields.address),

		getRSSI: () => fields.rssi,
		setRSSI(rssi) {
			fields.rssi = toInt8(rssi);
			touch(EIRDataType.RSSI);
		},
		getTxPower: () => fields.txPower,
		setTxPower(txPower) {
			fields.txPower = toInt8(txPower);
			touch(EIRDataType.TX_POWER);
		},

		getFlags: () => fields.flags,
		setFlags(flags) {
			fields.flags = toUint8(flags);
			touch(EIRDataType.FLAGS);
		},
		addFlags(flags) {
			fields.flags = toUint8(fields.flags | flags);
			touch(EIRDataType.FLAGS);
		},

		getName: () => fields.name,
		setName(name) {
			requireString("name", name);
			fields.name = name;
			touch(EIRDataType.NAME);
		},
		getShortName: () => fields.shortName,
		setShortName(name) {
			requireString("short name", name);
			fields.shortName = name;
			touch(EIRDataType.NAME_SHORT);
		},

		getManufacturerData: () =>
			fields.msd && createManufacturerData(fields.msd.company, fields.msd.data),
		setManufacturerData(company, data) {
			if (data !== undefined && !(data instanceof Uint8Array)) {
				throw new InvalidArgumentError(
					"manufacturer data",
					"payload must be a Uint8Array",
				);
			}
			fields.msd = createManufacturerData(company, data);
			touch(EIRDataType.MANUF_DATA);
		},

		getServices: () => [...fields.services],
		hasService(uuid) {
			const canonical = toCanonicalUuid(uuid);
			return canonical !== null && fields.services.includes(canonical);
		},
		addService(uuid) {
			requireString("uuid", uuid);
			const canonical = toCanonicalUuid(uuid);
			if (canonical === null) {
				throw new InvalidArgumentError("uuid", `malformed UUID '${uuid}'`);
			}
			if (storeService(canonical)) {
				fields.timestamp = now();
			}
		},
		getServicesComplete: () => fields.servicesComplete,
		setServicesComplete(complete) {
			fields.servicesComplete = complete;
			touch(EIRDataType.SERVICES_COMPLETE);
		},

		getDeviceClass: () => fields.deviceClass,
		setDeviceClass(deviceClass) {
			fields.deviceClass = toUint24(deviceClass);
			touch(EIRDataType.DEVICE_CLASS);
		},
		getAppearance: () => fields.appearance,
		setAppearance(appearance) {
			fields.appearance = toUint16(appearance);
			touch(EIRDataType.APPEARANCE);
		},

		getDeviceID: () => ({ ...fields.deviceId }),
		setDeviceID(source, vendor, product, version) {
			fields.deviceId = {
				source: toUint16(source),
				vendor: toUint16(vendor),
				product: toUint16(product),
				version: toUint16(version),
			};
			touch(EIRDataType.DEVICE_ID);
		},
		getDeviceIDModalias() {
			const { source, vendor, product, version } = fields.deviceId;
			const ids = `v${hex4(vendor)}p${hex4(product)}d${hex4(version)}`;
			switch (source) {
				case 0x0001:
					return `bluetooth:${ids}`;
				case 0x0002:
					return `usb:${ids}`;
				default:
					return `source<0x${source.toString(16).toUpperCase()}>:${ids}`;
			}
		},

		getConnInterval: () => ({ ...fields.connInterval }),
		setConnInterval(min, max) {
			const range = { min: toUint16(min), max: toUint16(max) };
			if (range.min > range.max) {
				console.warn(
					`${logPrefix} Connection interval min ${range.min} exceeds max ${range.max}`,
				);
			}
			fields.connInterval = range;
			touch(EIRDataType.CONN_IVAL);
		},

		merge(other) {
			if (other === report) {
				return EIRDataType.NONE;
			}
			const present = other.getEIRDataMask();
			let changed: EIRDataMask = EIRDataType.NONE;
			const has = (bit: EIRDataTypeBit) =>
				isEIRDataTypeSet(present, bit);
			const missing = (bit: EIRDataTypeBit) =>
				!isEIRDataTypeSet(fields.mask, bit);

			// Validate what other claims before touching anything
			const msd = has(EIRDataType.MANUF_DATA)
				? other.getManufacturerData()
				: null;
			if (has(EIRDataType.MANUF_DATA) && msd === null) {
				throw new InternalError(
					"Merged report has MANUF_DATA set but no manufacturer data",
				);
			}
			const services: string[] = [];
			if (has(EIRDataType.SERVICE_UUID)) {
				for (const uuid of other.getServices()) {
					const canonical = toCanonicalUuid(uuid);
					if (canonical === null) {
						throw new InternalError(
							`Merged report lists malformed service UUID '${uuid}'`,
						);
					}
					services.push(canonical);
				}
			}

			if (has(EIRDataType.BDADDR_TYPE)) {
				const type = other.getAddressType();
				const ad = other.getADAddressType();
				if (
					missing(EIRDataType.BDADDR_TYPE) ||
					fields.addressType !== type ||
					fields.adAddressType !== ad
				) {
					storeAddressType(type, ad);
					changed |= EIRDataType.BDADDR_TYPE;
				}
			}
			if (has(EIRDataType.BDADDR)) {
				const address = other.getAddress();
				if (
					missing(EIRDataType.BDADDR) ||
					!bytesEqual(fields.address, address)
				) {
					fields.address = address.slice(0, EUI48_SIZE);
					mark(EIRDataType.BDADDR);
					changed |= EIRDataType.BDADDR;
				}
			}

			const scalars: ReadonlyArray<
				readonly [
					EIRDataTypeBit,
					() => number | string | boolean,
					() => number | string | boolean,
					() => void,
				]
			> = [
				[
					EIRDataType.FLAGS,
					() => fields.flags,
					() => other.getFlags(),
					() => {
						fields.flags = other.getFlags();
					},
				],
				[
					EIRDataType.NAME,
					() => fields.name,
					() => other.getName(),
					() => {
						fields.name = other.getName();
					},
				],
				[
					EIRDataType.NAME_SHORT,
					() => fields.shortName,
					() => other.getShortName(),
					() => {
						fields.shortName = other.getShortName();
					},
				],
				[
					EIRDataType.RSSI,
					() => fields.rssi,
					() => other.getRSSI(),
					() => {
						fields.rssi = other.getRSSI();
					},
				],
				[
					EIRDataType.TX_POWER,
					() => fields.txPower,
					() => other.getTxPower(),
					() => {
						fields.txPower = other.getTxPower();
					},
				],
				[
					EIRDataType.DEVICE_CLASS,
					() => fields.deviceClass,
					() => other.getDeviceClass(),
					() => {
						fields.deviceClass = other.getDeviceClass();
					},
				],
				[
					EIRDataType.APPEARANCE,
					() => fields.appearance,
					() => other.getAppearance(),
					() => {
						fields.appearance = other.getAppearance();
					},
				],
				[
					EIRDataType.SERVICES_COMPLETE,
					() => fields.servicesComplete,
					() => other.getServicesComplete(),
					() => {
						fields.servicesComplete = other.getServicesComplete();
					},
				],
			];
			for (const [bit, mine, theirs, copy] of scalars) {
				if (has(bit) && (missing(bit) || mine() !== theirs())) {
					copy();
					mark(bit);
					changed |= bit;
				}
			}

			if (msd !== null) {
				if (
					missing(EIRDataType.MANUF_DATA) ||
					!manufacturerDataEquals(fields.msd, msd)
				) {
					fields.msd = createManufacturerData(msd.company, msd.data);
					mark(EIRDataType.MANUF_DATA);
					changed |= EIRDataType.MANUF_DATA;
				}
			}
			if (has(EIRDataType.DEVICE_ID)) {
				const id = other.getDeviceID();
				const mine = fields.deviceId;
				if (
					missing(EIRDataType.DEVICE_ID) ||
					mine.source !== id.source ||
					mine.vendor !== id.vendor ||
					mine.product !== id.product ||
					mine.version !== id.version
				) {
					fields.deviceId = { ...id };
					mark(EIRDataType.DEVICE_ID);
					changed |= EIRDataType.DEVICE_ID;
				}
			}
			if (has(EIRDataType.CONN_IVAL)) {
				const range = other.getConnInterval();
				if (
					missing(EIRDataType.CONN_IVAL) ||
					fields.connInterval.min !== range.min ||
					fields.connInterval.max !== range.max
				) {
					fields.connInterval = { ...range };
					mark(EIRDataType.CONN_IVAL);
					changed |= EIRDataType.CONN_IVAL;
				}
			}
			let added = false;
			for (const canonical of services) {
				added = storeService(canonical) || added;
			}
			if (added) {
				changed |= EIRDataType.SERVICE_UUID;
			}

			if (changed !== EIRDataType.NONE) {
				fields.timestamp = Math.max(fields.timestamp, other.getTimestamp());
			}
			const source = other.getSource();
			if (source !== "unset") {
				fields.source = source;
			}
			return changed;
		},

		clear() {
			fields = emptyFields(fields.timestamp);
		},

		eirDataMaskToString: () => `DataSet${maskToString(fields.mask)}`,

		toString(includeServices = true) {
			const parts: string[] = [report.eirDataMaskToString()];
			const is = (bit: EIRDataTypeBit) => isEIRDataTypeSet(fields.mask, bit);

			if (is(EIRDataType.BDADDR)) {
				parts.push(`address ${eui48ToString(fields.address)}`);
			}
			if (is(EIRDataType.BDADDR_TYPE)) {
				parts.push(
					`address-type ${addressTypeToString(fields.addressType)}/${fields.adAddressType}`,
				);
			}
			if (is(EIRDataType.FLAGS)) {
				parts.push(`flags ${gapFlagsToString(fields.flags)}`);
			}
			if (is(EIRDataType.NAME)) {
				parts.push(`name '${fields.name}'`);
			}
			if (is(EIRDataType.NAME_SHORT)) {
				parts.push(`short-name '${fields.shortName}'`);
			}
			if (is(EIRDataType.RSSI)) {
				parts.push(`rssi ${fields.rssi}`);
			}
			if (is(EIRDataType.TX_POWER)) {
				parts.push(`tx-power ${fields.txPower}`);
			}
			if (is(EIRDataType.MANUF_DATA)) {
				parts.push(manufacturerDataToString(fields.msd));
			}
			if (is(EIRDataType.DEVICE_CLASS)) {
				parts.push(`dev-class ${toHexNumber(fields.deviceClass, 6)}`);
			}
			if (is(EIRDataType.APPEARANCE)) {
				parts.push(`appearance ${toHexNumber(fields.appearance, 4)}`);
			}
			if (is(EIRDataType.DEVICE_ID)) {
				const { source, vendor, product, version } = fields.deviceId;
				parts.push(
					`device-id[source ${toHexNumber(source, 4)}, vendor ${toHexNumber(vendor, 4)}, product ${toHexNumber(product, 4)}, version ${toHexNumber(version, 4)}]`,
				);
			}
			if (is(EIRDataType.CONN_IVAL)) {
				parts.push(
					`conn-interval[${fields.connInterval.min}..${fields.connInterval.max}]`,
				);
			}
			if (is(EIRDataType.SERVICES_COMPLETE)) {
				parts.push(`services-complete ${fields.servicesComplete}`);
			}
			if (is(EIRDataType.SERVICE_UUID)) {
				parts.push(`services ${fields.services.length}`);
			}

			let out = `Report::${fields.source}[${parts.join(", ")}]`;
			if (includeServices) {
				for (const uuid of fields.services) {
					out += `\n  ${uuid}`;
				}
			}
			return out;
		},
	};

	return report;
}

/**
 * Creates an independent copy of `report`: same fields, presence mask,
 * source and timestamp. Later changes to either side do not affect the
 * other.
 */
export function cloneReport(report: Report, options: ReportOptions = {}): Report {
	const copy = createReport(options);
	copy.merge(report);
	copy.setSource(report.getSource());
	copy.setTimestamp(report.getTimestamp());
	return copy;
}
