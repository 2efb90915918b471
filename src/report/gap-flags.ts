import { toUint8 } from "../utils/buffer";

/**
 * GAP flags data type bits (Core Specification Supplement, Part A, 1.3).
 */
export const GAPFlags = {
	NONE: 0,
	LE_Ltd_Discoverable: 1 << 0,
	LE_Gen_Discoverable: 1 << 1,
	BREDR_UNSUPPORTED: 1 << 2,
	DUAL_LE_BREDR_SameCtrl: 1 << 3,
	DUAL_LE_BREDR_SameHost: 1 << 4,
} as const;

export type GAPFlagName = Exclude<keyof typeof GAPFlags, "NONE">;

const FLAG_NAMES: readonly GAPFlagName[] = [
	"LE_Ltd_Discoverable",
	"LE_Gen_Discoverable",
	"BREDR_UNSUPPORTED",
	"DUAL_LE_BREDR_SameCtrl",
	"DUAL_LE_BREDR_SameHost",
];

/**
 * Renders GAP flags as `[LE_Gen_Discoverable, BREDR_UNSUPPORTED]`.
 * Reserved bits show up as `RESERVED<bit>`.
 */
export function gapFlagsToString(flags: number): string {
	const value = toUint8(flags);
	const names: string[] = FLAG_NAMES.filter(
		(name) => (value & GAPFlags[name]) !== 0,
	);
	for (let bit = 5; bit < 8; bit++) {
		if ((value & (1 << bit)) !== 0) {
			names.push(`RESERVED${bit}`);
		}
	}
	return `[${names.join(", ")}]`;
}
