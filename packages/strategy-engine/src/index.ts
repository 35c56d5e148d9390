export { alignPrices } from "./alignPrices";
export type { AlignedPriceTable, AlignedRow } from "./alignPrices";
export { decisionDates, decisionFlags } from "./rebalanceSchedule";
export { selectAsset } from "./selectAsset";
export type { MomentumSnapshot } from "./selectAsset";
export { RotationStrategy, generateSignals } from "./rotationStrategy";
