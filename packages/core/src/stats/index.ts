export { TrafficStats } from './traffic-stats.js';
export type { TrafficStatsData, TrafficStatsEvents, TrafficStatsOptions } from './traffic-stats.js';
