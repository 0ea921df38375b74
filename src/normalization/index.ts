/**
 * Normalization module exports.
 */

export {
  emptyPosition,
  toPositionSnapshot,
  groupPositions,
  parseCreateTimeMs,
  toOrderView,
  groupOrdersByInstrument,
  toInstrumentInfo,
  toBookTop,
  toAccountSummary,
} from "./normalizeGrvt";
