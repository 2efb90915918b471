/**
 * Property tests for report merging.
 *
 * Reports are built from random subsets of field groups, then merged in
 * both directions to check the presence and change mask laws.
 */

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
	cloneReport,
	createReport,
	EIRDataType,
	type EIRDataTypeName,
	eirDataTypeNames,
	isEIRDataTypeSet,
	type Report,
	type ReportSource,
	RSSI_NOT_AVAILABLE,
} from "../../report";

interface ReportSpec {
	source: ReportSource;
	address?: number[];
	adAddressType?: number;
	flags?: number;
	name?: string;
	shortName?: string;
	rssi?: number;
	txPower?: number;
	msd?: { company: number; data: number[] };
	services?: string[];
	servicesComplete?: boolean;
	deviceClass?: number;
	appearance?: number;
	deviceId?: [number, number, number, number];
	connInterval?: [number, number];
}

const optional = <T>(arb: fc.Arbitrary<T>) =>
	fc.option(arb, { nil: undefined });

// Small value domains so that equal values show up between two reports
const u16 = fc.constantFrom(0, 1, 0x5d, 0xffff);

const specArb: fc.Arbitrary<ReportSpec> = fc.record({
	source: fc.constantFrom<ReportSource>(
		"unset",
		"advertisement",
		"inquiry-response",
	),
	address: optional(fc.array(fc.constantFrom(0, 1, 0xff), { minLength: 6, maxLength: 6 })),
	adAddressType: optional(fc.integer({ min: 0, max: 4 })),
	flags: optional(fc.constantFrom(0, 0x02, 0x06)),
	name: optional(fc.constantFrom("", "Thermo-1", "Thermo-2")),
	shortName: optional(fc.constantFrom("T", "Th")),
	rssi: optional(fc.integer({ min: -127, max: 127 })),
	txPower: optional(fc.constantFrom(-4, 0, 4)),
	msd: optional(
		fc.record({
			company: fc.constantFrom(0x004c, 0x0059),
			data: fc.array(fc.constantFrom(1, 2), { maxLength: 2 }),
		}),
	),
	services: optional(
		fc.uniqueArray(fc.constantFrom("180f", "180a", "1800", "2a37"), {
			minLength: 1,
		}),
	),
	servicesComplete: optional(fc.boolean()),
	deviceClass: optional(fc.constantFrom(0, 0x1f00, 0x5a020c)),
	appearance: optional(fc.constantFrom(0, 0x03c1)),
	deviceId: optional(fc.tuple(u16, u16, u16, u16)),
	connInterval: optional(fc.tuple(fc.constantFrom(6, 24), fc.constantFrom(24, 40))),
});

function build(spec: ReportSpec): Report {
	const report = createReport();
	report.setSource(spec.source);
	if (spec.address) report.setAddress(new Uint8Array(spec.address));
	if (spec.adAddressType !== undefined) report.setADAddressType(spec.adAddressType);
	if (spec.flags !== undefined) report.setFlags(spec.flags);
	if (spec.name !== undefined) report.setName(spec.name);
	if (spec.shortName !== undefined) report.setShortName(spec.shortName);
	if (spec.rssi !== undefined) report.setRSSI(spec.rssi);
	if (spec.txPower !== undefined) report.setTxPower(spec.txPower);
	if (spec.msd) {
		report.setManufacturerData(spec.msd.company, new Uint8Array(spec.msd.data));
	}
	for (const uuid of spec.services ?? []) report.addService(uuid);
	if (spec.servicesComplete !== undefined) {
		report.setServicesComplete(spec.servicesComplete);
	}
	if (spec.deviceClass !== undefined) report.setDeviceClass(spec.deviceClass);
	if (spec.appearance !== undefined) report.setAppearance(spec.appearance);
	if (spec.deviceId) report.setDeviceID(...spec.deviceId);
	if (spec.connInterval) report.setConnInterval(...spec.connInterval);
	return report;
}

/** Comparable value of one field group */
function groupValue(report: Report, name: EIRDataTypeName): string {
	switch (name) {
		case "BDADDR_TYPE":
			return `${report.getAddressType()}/${report.getADAddressType()}`;
		case "BDADDR":
			return report.getAddressString();
		case "FLAGS":
			return String(report.getFlags());
		case "NAME":
			return report.getName();
		case "NAME_SHORT":
			return report.getShortName();
		case "RSSI":
			return String(report.getRSSI());
		case "TX_POWER":
			return String(report.getTxPower());
		case "MANUF_DATA": {
			const msd = report.getManufacturerData();
			return msd ? `${msd.company}:${Array.from(msd.data).join(",")}` : "null";
		}
		case "DEVICE_CLASS":
			return String(report.getDeviceClass());
		case "APPEARANCE":
			return String(report.getAppearance());
		case "DEVICE_ID":
			return JSON.stringify(report.getDeviceID());
		case "CONN_IVAL":
			return JSON.stringify(report.getConnInterval());
		case "SERVICES_COMPLETE":
			return String(report.getServicesComplete());
		case "SERVICE_UUID":
			return report.getServices().join(",");
	}
}

function expectedChanges(before: Report, other: Report): number {
	let expected = 0;
	for (const name of eirDataTypeNames(other.getEIRDataMask())) {
		const bit = EIRDataType[name];
		if (!isEIRDataTypeSet(before.getEIRDataMask(), bit)) {
			expected |= bit;
		} else if (name === "SERVICE_UUID") {
			const known = before.getServices();
			if (other.getServices().some((uuid) => !known.includes(uuid))) {
				expected |= bit;
			}
		} else if (groupValue(before, name) !== groupValue(other, name)) {
			expected |= bit;
		}
	}
	return expected;
}

describe("Property: merge", () => {
	it("is a no-op on itself", () => {
		fc.assert(
			fc.property(specArb, (spec) => {
				const report = build(spec);
				const rendered = report.toString();
				const timestamp = report.getTimestamp();
				expect(report.merge(report)).toBe(EIRDataType.NONE);
				expect(report.toString()).toBe(rendered);
				expect(report.getTimestamp()).toBe(timestamp);
			}),
		);
	});

	it("keeps every presence bit of both sides", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const a = build(specA);
				const b = build(specB);
				const before = a.getEIRDataMask();
				a.merge(b);
				expect(a.getEIRDataMask()).toBe(before | b.getEIRDataMask());
			}),
		);
	});

	it("reports exactly the groups that were new or different", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const a = build(specA);
				const b = build(specB);
				const before = cloneReport(a);
				expect(a.merge(b)).toBe(expectedChanges(before, b));
			}),
		);
	});

	it("takes every group the other report carries", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const a = build(specA);
				const b = build(specB);
				a.merge(b);
				for (const name of eirDataTypeNames(b.getEIRDataMask())) {
					if (name === "SERVICE_UUID") {
						for (const uuid of b.getServices()) {
							expect(a.hasService(uuid)).toBe(true);
						}
					} else {
						expect(groupValue(a, name)).toBe(groupValue(b, name));
					}
				}
			}),
		);
	});

	it("reports nothing on an immediate re-merge", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const a = build(specA);
				const b = build(specB);
				a.merge(b);
				expect(a.merge(b)).toBe(EIRDataType.NONE);
			}),
		);
	});

	it("keeps the source unless the other one is set", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const a = build(specA);
				const b = build(specB);
				a.merge(b);
				const expected = specB.source === "unset" ? specA.source : specB.source;
				expect(a.getSource()).toBe(expected);
			}),
		);
	});
});

describe("Property: clear", () => {
	it("always returns to the empty report", () => {
		fc.assert(
			fc.property(specArb, (spec) => {
				const report = build(spec);
				report.clear();
				expect(report.getEIRDataMask()).toBe(EIRDataType.NONE);
				expect(report.getSource()).toBe("unset");
				expect(report.getRSSI()).toBe(RSSI_NOT_AVAILABLE);
				expect(report.getServices()).toEqual([]);
				expect(report.getManufacturerData()).toBeNull();
				expect(report.toString()).toBe("Report::unset[DataSet[]]");
			}),
		);
	});
});

describe("Property: clone", () => {
	it("renders like the original and stays independent", () => {
		fc.assert(
			fc.property(specArb, specArb, (specA, specB) => {
				const original = build(specA);
				const copy = cloneReport(original);
				expect(copy.toString()).toBe(original.toString());

				const rendered = original.toString();
				copy.merge(build(specB));
				expect(original.toString()).toBe(rendered);
			}),
		);
	});
});
