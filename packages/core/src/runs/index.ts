export { belongsTo, containsDevice, filterRuns, filterView } from './filter'
