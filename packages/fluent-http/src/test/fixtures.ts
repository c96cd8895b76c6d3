/**
 * Shared test fixtures and constants.
 */

// ============================================================================
// URLs
// ============================================================================

export const TEST_BASE_URL = 'https://api.example.com';
export const TEST_STATUS_URL = `${TEST_BASE_URL}/status`;
export const TEST_ITEMS_URL = `${TEST_BASE_URL}/items`;
export const TEST_DOWNLOAD_URL = `${TEST_BASE_URL}/files/archive.bin`;

// ============================================================================
// Headers
// ============================================================================

export const AUTHORIZATION_HEADER = 'Authorization';
export const ENGINE_TOKEN = 'Bearer test-engine-token';
export const REQUEST_TOKEN = 'Bearer test-request-token';

// ============================================================================
// Timeouts
// ============================================================================

/** Default request timeout in milliseconds (30 seconds) */
export const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================================================
// Bodies
// ============================================================================

/** Text with multi-byte characters to check UTF-8 handling */
export const UNICODE_TEXT = 'héllo wörld ✓';

/**
 * Creates a byte body of the given length with a repeating pattern.
 */
export const createBinaryBody = (length: number): Uint8Array =>
  Uint8Array.from({ length }, (_, index) => index % 256);
