import { describe, expect, it } from "vitest";
import {
	bytesEqual,
	toHexNumber,
	toHexString,
	toInt8,
	toUint8,
	toUint16,
	toUint24,
} from "./buffer";

describe("toInt8", () => {
	it("keeps in-range values", () => {
		expect(toInt8(-60)).toBe(-60);
		expect(toInt8(127)).toBe(127);
		expect(toInt8(-128)).toBe(-128);
	});

	it("wraps unsigned wire bytes into the signed range", () => {
		expect(toInt8(0xc4)).toBe(-60);
		expect(toInt8(0xff)).toBe(-1);
		expect(toInt8(0x80)).toBe(-128);
	});

	it("drops bits above the byte", () => {
		expect(toInt8(0x1_05)).toBe(5);
	});
});

describe("unsigned coercion", () => {
	it("masks to the field width", () => {
		expect(toUint8(0x1ff)).toBe(0xff);
		expect(toUint8(-1)).toBe(0xff);
		expect(toUint16(0x12345)).toBe(0x2345);
		expect(toUint16(-1)).toBe(0xffff);
		expect(toUint24(0x1234567)).toBe(0x234567);
	});
});

describe("bytesEqual", () => {
	it("compares by content", () => {
		expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(
			true,
		);
		expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(
			false,
		);
	});

	it("differs on length", () => {
		expect(bytesEqual(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
	});

	it("treats empty arrays as equal", () => {
		expect(bytesEqual(new Uint8Array(), new Uint8Array())).toBe(true);
	});

	it("handles null", () => {
		expect(bytesEqual(null, null)).toBe(true);
		expect(bytesEqual(null, new Uint8Array())).toBe(false);
		expect(bytesEqual(new Uint8Array(), null)).toBe(false);
	});
});

describe("toHexString", () => {
	it("renders bytes in order", () => {
		expect(toHexString(new Uint8Array([0x01, 0xab, 0x00]))).toBe("01ab00");
	});

	it("renders empty input as empty string", () => {
		expect(toHexString(new Uint8Array())).toBe("");
	});
});

describe("toHexNumber", () => {
	it("pads to the requested width", () => {
		expect(toHexNumber(0x1f00, 6)).toBe("0x001f00");
		expect(toHexNumber(0, 4)).toBe("0x0000");
	});
});
