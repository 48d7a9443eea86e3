/**
 * Compliance types for export privacy analysis.
 *
 * @module @quipkeep/compliance
 */

/**
 * Inclusion policy for a single export. Built per request, never persisted.
 */
export interface ExportOptions {
  /** Include `api.*` preferences (credentials and endpoint configuration) */
  includeCredentials: boolean;
  /** Include platform, OS version and app build */
  includeDeviceInfo: boolean;
  /** Include aggregate usage statistics */
  includeUsageStatistics: boolean;
  /** Redact identifying substrings from content (best effort) */
  anonymize: boolean;
}

export const DEFAULT_EXPORT_OPTIONS: Readonly<ExportOptions> = {
  includeCredentials: false,
  includeDeviceInfo: true,
  includeUsageStatistics: true,
  anonymize: false,
};

export const SECURE_EXPORT_OPTIONS: Readonly<ExportOptions> = {
  includeCredentials: false,
  includeDeviceInfo: false,
  includeUsageStatistics: true,
  anonymize: true,
};

/**
 * Severity of a compliance issue. Any `high` issue requires explicit user
 * acknowledgement before the export starts.
 */
export type ComplianceSeverity = 'low' | 'medium' | 'high';

/**
 * Kinds of data an export can carry.
 */
export type DataCategory =
  | 'contentRecords'
  | 'favorites'
  | 'preferences'
  | 'exportMetadata'
  | 'credentials'
  | 'deviceInfo'
  | 'usageStatistics';

export interface DataCategoryNotice {
  readonly category: DataCategory;
  readonly sensitivity: ComplianceSeverity;
}

/**
 * What an export will contain, split into the categories that are always
 * exported and the optional ones the user selected.
 */
export interface PrivacyNotice {
  readonly alwaysIncluded: readonly DataCategoryNotice[];
  readonly optionalIncluded: readonly DataCategoryNotice[];
  readonly recommendations: readonly string[];
}

export type ComplianceIssueCategory =
  | 'sensitiveDataIncluded'
  | 'deviceInfoIncluded'
  | 'heuristicAnonymization'
  | 'personalContentDetected';

export interface ComplianceIssue {
  readonly category: ComplianceIssueCategory;
  readonly severity: ComplianceSeverity;
  readonly description: string;
  readonly recommendation: string;
}

export interface ComplianceAnalysis {
  readonly notice: PrivacyNotice;
  readonly issues: readonly ComplianceIssue[];
}

/**
 * A redaction rule. `pattern` must carry the global flag.
 */
export interface RedactionPattern {
  readonly name: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

export interface AnonymizerConfig {
  /** Personal names to redact, matched case-insensitively on word boundaries */
  names?: readonly string[];
  /** Extra rules applied after the built-in ones */
  patterns?: readonly RedactionPattern[];
  /** Replace the built-in rules instead of extending them */
  replaceDefaults?: boolean;
}

export interface AnonymizationResult {
  readonly text: string;
  /** Number of substrings replaced */
  readonly redactions: number;
}
