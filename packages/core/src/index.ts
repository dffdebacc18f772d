export { TopNPipeline } from './top-n-pipeline';
export type { ParseFailure, TopNPipelineEvents } from './top-n-pipeline';
export { EventTimeAssigner } from './event-time-assigner';
export type { EventTimeAssignerOptions } from './event-time-assigner';
export { WindowAggregator } from './window-aggregator';
export type { WindowAggregatorOptions, LateRecord, AccumulatorSnapshot } from './window-aggregator';
export { TopNSelector } from './top-n-selector';
export type { TopNSelectorOptions } from './top-n-selector';
export { SlidingWindowAssigner } from './window-assigner';
export { TimerService } from './timer-service';
export type { Timer } from './timer-service';
export { countAggregate } from './aggregate-functions';
export { formatReport, formatReportTime, assertTimeZone } from './report-formatter';
export { PerformanceMonitor } from './performance-monitor';
export type { PerformanceMetrics } from './performance-monitor';
export { loadConfig, resolveOptions, parseDuration, DEFAULT_OPTIONS } from './config';
export type { ResolvedPipelineOptions } from './config';
export * from './types';
export * from './utils';
