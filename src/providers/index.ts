export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { LOG_LEVELS, isLogLevel, meetsLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
