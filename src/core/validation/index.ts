/**
 * Validation module exports
 *
 * Configuration and template validation utilities.
 *
 * @module validation
 */

export { ConfigValidator } from "./config-validator.js";
export { TemplateValidator } from "./template-validator.js";
export type {
	TemplateCheckOptions,
	TemplateCheckResult,
	TemplateIssue,
} from "./template-validator.js";
