export { structuredPlacement, cornerPositions, edgePositions } from "./structured";
export { greedySearch, type GreedyResult } from "./greedy";
export {
  decodeAction,
  splitAction,
  randomValidPlacement,
  actionSpaceSize,
  type ActionHint,
} from "./decoder";
export { largestProduct, findBestFittingStock, eligibleProducts, area } from "./products";
export { resolveDecision, ExplorationPhase, type Stage } from "./pipeline";
