export { MonitorService } from './MonitorService';
export { HttpProber } from './HttpProber';
export { classifyProbe, formatDuration, isAlertWorthy } from './classify';
export { runWithConcurrency } from './concurrency';
export type { MonitorServiceDeps } from './MonitorService';
export type { HttpProberOptions } from './HttpProber';
export type { Classification } from './classify';
export * from './types';
