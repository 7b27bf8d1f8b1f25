export * from './types';
export * from './errors';
export * from './clean';
export * from './tokens';
export * from './header';
export * from './course';
export * from './names';
export * from './records';
export * from './holeStatus';
export * from './standings';
export * from './parse';
export * from './cache';
export * from './catalog';
export * from './export';
export * from './config';
export * from './telemetry';
