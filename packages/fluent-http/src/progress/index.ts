export { createDownloadProgress, parseContentLength } from './download-progress.js';
export type { DownloadProgress, ProgressCallback } from './download-progress.js';
