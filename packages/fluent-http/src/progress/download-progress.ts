/**
 * Snapshot of an in-flight download.
 */
export interface DownloadProgress {
  /** Bytes received so far */
  readonly bytesDownloaded: number;
  /** Total bytes expected; 0 when the server did not announce a length */
  readonly totalBytes: number;
  /**
   * Completed share between 0 and 1; 0 when the total is unknown.
   * Capped at 1: Content-Length may count encoded bytes, `bytesDownloaded` decoded ones.
   */
  readonly fraction: number;
}

/**
 * Receives progress snapshots while a download is in flight.
 */
export type ProgressCallback = (progress: DownloadProgress) => void;

/**
 * Creates an immutable progress snapshot.
 */
export const createDownloadProgress = (
  bytesDownloaded: number,
  totalBytes: number
): DownloadProgress =>
  Object.freeze({
    bytesDownloaded,
    totalBytes,
    fraction: totalBytes > 0 ? Math.min(bytesDownloaded / totalBytes, 1) : 0,
  });

/**
 * Parses a Content-Length header value.
 * Returns 0 (unknown) for a missing, non-numeric or negative value.
 */
export const parseContentLength = (value: string | undefined): number => {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return 0;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : 0;
};
