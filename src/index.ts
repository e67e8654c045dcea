export * from './file-ops';
export { TreeDisplay } from './main/tree-display';
export type { TreeDisplayOptions } from './main/tree-display';
export { consoleSink, fileSink, createFileSink } from './main/sinks';
export type { FileSink, WriteResult } from './main/sinks';
export { writeExport } from './main/export-writer';
export { logger, setLogLevel, getLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';
