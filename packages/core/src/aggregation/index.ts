/**
 * Aggregation Module
 *
 * Grouping and median statistics over filtered runs.
 */

export { aggregate, aggregatePayloads } from './engine'
export { finiteSorted, median } from './median'
export type { AggregatedGroup, AggregationResult, GroupDimension, GroupKeyValue, MetricName } from './types'
export { METRICS } from './types'
