export { AnalysisCycle, DEFAULT_HISTORY_BARS, DEFAULT_MAX_BARS } from './analysis-cycle'
export type { AnalysisCycleOptions, CycleListener, CycleResult, CycleStatus } from './analysis-cycle'
