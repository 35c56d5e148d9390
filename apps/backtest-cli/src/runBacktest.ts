import type {
	ModuleLogger,
	PerformanceSummary,
	PriceSeries,
	RotationConfig,
	SignalRecord,
} from "@gold-rotation/core";
import type { AssetFetchOptions } from "@gold-rotation/data";
import type { BacktestReport } from "@gold-rotation/metrics";
import { buildBacktestReport, formatSignalTable } from "@gold-rotation/metrics";
import type { PersistenceLayer } from "@gold-rotation/persistence";
import { RotationStrategy } from "@gold-rotation/strategy-engine";
import type { BacktestArgs } from "./cliArgs";

/** The slice of PriceAcquisition a run needs. */
export interface AssetFetcher {
	fetchAsset(
		symbol: string,
		start: string,
		end?: string,
		options?: AssetFetchOptions
	): Promise<PriceSeries>;
}

export interface BacktestDependencies {
	acquisition: AssetFetcher;
	persistence: PersistenceLayer;
	logger?: Pick<ModuleLogger, "info">;
}

export type BacktestRequest = Omit<BacktestArgs, "json" | "rotationOverrides"> & {
	rotation: RotationConfig;
};

export interface BacktestOutcome {
	request: BacktestRequest;
	goldRows: number;
	equityRows: number;
	records: SignalRecord[];
	report: BacktestReport;
	outputPath: string;
}

export const signalTableFileName = (equitySymbol: string): string =>
	`backtest_${equitySymbol.replace(/[^A-Za-z0-9._-]/g, "_")}.csv`;

export const runBacktest = async (
	request: BacktestRequest,
	deps: BacktestDependencies
): Promise<BacktestOutcome> => {
	const gold = await deps.acquisition.fetchAsset(
		request.goldSymbol,
		request.start,
		request.end,
		{ useCache: request.useCache }
	);
	const equity = await deps.acquisition.fetchAsset(
		request.equitySymbol,
		request.start,
		request.end,
		{ instrumentType: request.instrumentType }
	);

	const records = new RotationStrategy(request.rotation).generate(gold, equity);
	const report = buildBacktestReport(records);
	const outputPath = await deps.persistence.saveTable(
		signalTableFileName(request.equitySymbol),
		formatSignalTable(records)
	);

	deps.logger?.info("backtest_complete", {
		goldSymbol: request.goldSymbol,
		equitySymbol: request.equitySymbol,
		days: records.length,
		switches: report.activity.switches,
		outputPath,
	});

	return {
		request,
		goldRows: gold.length,
		equityRows: equity.length,
		records,
		report,
		outputPath,
	};
};

const formatPct = (value: number): string =>
	Number.isFinite(value) ? `${(value * 100).toFixed(2)}%` : "n/a";

const formatRatio = (value: number): string =>
	Number.isFinite(value) ? value.toFixed(2) : "n/a";

const summaryRow = (label: string, summary: PerformanceSummary | null): string => {
	const cells = summary
		? [
				formatPct(summary.cagr),
				formatPct(summary.annualizedVol),
				formatRatio(summary.sharpe),
				formatPct(summary.maxDrawdown),
				summary.terminalValue.toFixed(4),
			]
		: ["n/a", "n/a", "n/a", "n/a", "n/a"];
	return [label.padEnd(18), ...cells.map((cell) => cell.padStart(10))].join("");
};

/** Console report: strategy against both buy-and-hold legs. */
export const formatBacktestReport = (outcome: BacktestOutcome): string => {
	const { request, report, records } = outcome;
	const { rotation } = request;
	const first = records[0]?.date ?? request.start;
	const last = records[records.length - 1]?.date ?? request.end ?? request.start;
	const exposure = Object.entries(report.activity.exposure)
		.map(([position, share]) => `${position} ${formatPct(share)}`)
		.join(", ");

	return [
		`Rotation ${request.goldSymbol} vs ${request.equitySymbol}: ${first} to ${last} (${records.length} days)`,
		`lookback ${rotation.lookbackDays}, ${rotation.rebalance} rebalance, fee ${rotation.feeBps} bps, ${rotation.alignment} alignment`,
		[
			"".padEnd(18),
			...["CAGR", "Vol", "Sharpe", "MaxDD", "Final"].map((h) => h.padStart(10)),
		].join(""),
		summaryRow("strategy", report.strategy),
		summaryRow("buy & hold gold", report.goldBuyHold),
		summaryRow("buy & hold equity", report.equityBuyHold),
		`switches ${report.activity.switches}, fees ${formatPct(report.activity.totalFees)}, exposure ${exposure || "n/a"}`,
	].join("\n");
};
