import type {
	Position,
	PriceSeries,
	RotationConfig,
	SignalRecord,
} from "@gold-rotation/core";
import { createRotationConfig } from "@gold-rotation/core";
import { momentum, simpleReturns } from "@gold-rotation/indicators";
import { alignPrices } from "./alignPrices";
import type { AlignedPriceTable } from "./alignPrices";
import { decisionFlags } from "./rebalanceSchedule";
import { selectAsset } from "./selectAsset";

const BPS = 10_000;

const assetReturn = (
	position: Position,
	goldRet: number,
	equityRet: number
): number => {
	if (position === "GOLD") {
		return goldRet;
	}
	if (position === "EQUITY") {
		return equityRet;
	}
	return 0;
};

/**
 * Two-asset momentum rotation. Decisions use each decision date's close and
 * are held from the next trading day, so no day's position depends on that
 * day's own prices.
 */
export class RotationStrategy {
	readonly config: RotationConfig;

	constructor(config: Partial<RotationConfig> = {}) {
		this.config = createRotationConfig(config);
	}

	generate(gold: PriceSeries, equity: PriceSeries): SignalRecord[] {
		return this.fromTable(alignPrices(gold, equity, this.config.alignment));
	}

	fromTable(table: AlignedPriceTable): SignalRecord[] {
		const { lookbackDays, rebalance, feeBps, cashSymbol } = this.config;
		const goldCloses = table.map((row) => row.gold);
		const equityCloses = table.map((row) => row.equity);
		const goldRets = simpleReturns(goldCloses);
		const equityRets = simpleReturns(equityCloses);
		const goldMomentum = momentum(goldCloses, lookbackDays);
		const equityMomentum = momentum(equityCloses, lookbackDays);
		const flags = decisionFlags(
			table.map((row) => row.date),
			rebalance
		);
		const feeRate = feeBps / BPS;

		const records: SignalRecord[] = [];
		let signal: Position = cashSymbol;
		let held: Position = cashSymbol;
		table.forEach((row, idx) => {
			const executed = signal;
			if (flags[idx]) {
				signal =
					selectAsset(
						{ GOLD: goldMomentum[idx], EQUITY: equityMomentum[idx] },
						cashSymbol
					) ?? signal;
			}
			const fee = executed !== held ? feeRate : 0;
			held = executed;
			records.push({
				date: row.date,
				rawSignal: signal,
				executedPosition: executed,
				goldRet: goldRets[idx],
				equityRet: equityRets[idx],
				fee,
				portfolioRet: assetReturn(executed, goldRets[idx], equityRets[idx]) - fee,
			});
		});
		return records;
	}
}

/** Convenience wrapper validating `config` and running one rotation. */
export function generateSignals(
	gold: PriceSeries,
	equity: PriceSeries,
	config: Partial<RotationConfig> = {}
): SignalRecord[] {
	return new RotationStrategy(config).generate(gold, equity);
}
