import type { AssetKey, Position } from "@gold-rotation/core";
import { TIE_BREAK_ORDER } from "@gold-rotation/core";

export type MomentumSnapshot = Record<AssetKey, number | null>;

/**
 * Pick the asset with the strictly greatest momentum, scanning in
 * {@link TIE_BREAK_ORDER} so equal readings go to the earlier asset. A best
 * reading at or below zero selects `cashSymbol`. Returns null unless every
 * asset has a momentum reading.
 */
export function selectAsset(
	momentum: MomentumSnapshot,
	cashSymbol: string
): Position | null {
	let best: AssetKey | null = null;
	let bestValue = Number.NEGATIVE_INFINITY;
	for (const asset of TIE_BREAK_ORDER) {
		const value = momentum[asset];
		if (value === null) {
			return null;
		}
		if (value > bestValue) {
			best = asset;
			bestValue = value;
		}
	}
	if (best === null) {
		return null;
	}
	return bestValue > 0 ? best : cashSymbol;
}
