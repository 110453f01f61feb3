/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestForum } from '../../test-utils/index.js';
 *
 * const forum = createTestForum();
 * ```
 */

export { createTestForum, createRecordingLogger, TEST_BCRYPT_ROUNDS, type RecordedMessages } from './forum.js';
