/**
 * fmtkit
 * printf-style string formatting
 *
 * @version 1.0.0
 * @license MIT
 */

// ============================================================================
// TOP-LEVEL HELPERS
// ============================================================================

export { sprintf, vsprintf, sprintfEach, getDefaultFormatter } from "./sprintf.js";

// ============================================================================
// JSON ARGUMENTS
// ============================================================================

export { parseArgumentList } from "./utils.js";

// ============================================================================
// CORE
// ============================================================================

export * from "./core/index.js";
