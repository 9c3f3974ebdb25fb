export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS, isLogLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ILinguisticFeatureProvider } from './ILinguisticFeatureProvider.js';
export { HttpLinguisticFeatureProvider } from './HttpLinguisticFeatureProvider.js';
