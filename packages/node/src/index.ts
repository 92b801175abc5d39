/**
 * @rewatch/node - resource drivers for Node.js
 */

export { fileContents, fileMonitor, clearFileInputs, readFileOutput } from './fileContents.js';
export type { FileContentsOptions, FileWatcherLike } from './fileContents.js';
