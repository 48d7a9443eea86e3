/**
 * @quipkeep/compliance: privacy analysis for snapshot exports
 *
 * @example
 * ```typescript
 * import { createComplianceAnalyzer, SECURE_EXPORT_OPTIONS } from '@quipkeep/compliance';
 *
 * const analyzer = createComplianceAnalyzer();
 * const { notice, issues } = analyzer.analyze(SECURE_EXPORT_OPTIONS);
 * if (analyzer.requiresAcknowledgement(issues)) {
 *   // ask the user before exporting
 * }
 * ```
 *
 * @module @quipkeep/compliance
 */

export * from './types.js';
export * from './anonymizer.js';
export * from './compliance-analyzer.js';
