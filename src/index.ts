export * from './errors';
export * from './config';
export * from './types/types';
export * from './utils/clock';
export * from './utils/distance-graph';
export * from './utils/entity-store';
export * from './utils/hub-loader';
export * from './utils/logger';
export * from './simulation/driver';
export * from './simulation/status-log';
export * from './simulation/truck';
export * from './simulation/loading-policy';
export * from './simulation/package-lifecycle';
export * from './simulation/route-planner';
export * from './report/hub-report';
export type { SimulationContext } from './simulation/context';
