export { aggregate, AggregationError } from './aggregator.js'
export type { AnalysisContext, AggregationFailure, ChangeRequestRef } from './types.js'
