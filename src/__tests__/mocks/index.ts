/**
 * mysql-advisor - Test Mocks
 *
 * Centralized mock factories for testing. All tests should import
 * mocks from this module for consistency.
 */

// Snapshot fixtures
export {
    BASELINE_HOST,
    createServerState,
    createTestSnapshot
} from './snapshot.js';
export type { SnapshotOverrides, StateOverrides } from './snapshot.js';

// In-memory adapter
export { FakeAdapter } from './adapter.js';

// MySQL connection and pool mocks
export {
    createMockPoolConnection,
    createMockPool,
    createAccessDeniedError,
    setupMockQueryResponse
} from './mysql.js';
