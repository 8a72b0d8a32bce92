export * from './common/framework/index.js';
export { Logger } from './common/internal/logging/logger.js';
export type { SweepFile } from './common/internal/file_loader.js';
