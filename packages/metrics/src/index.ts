export {
	buildBacktestReport,
	cumulativeCurve,
	maxDrawdown,
	rotationActivity,
	standardDeviation,
	summarize,
} from "./calcPerformance";
export { formatSignalTable, SIGNAL_TABLE_COLUMNS } from "./formatCSV";
export type { BacktestReport, RotationActivity } from "./metricsSchema";
