/**
 * ComplianceAnalyzer: privacy review of an export before it runs.
 *
 * Pure with respect to its inputs: the analyzer reads the chosen
 * {@link ExportOptions} (and optionally the records about to be exported)
 * and reports what the file will contain and which choices deserve a
 * second look. Enforcing acknowledgement of high-severity issues is the
 * caller's job.
 */

import type { ContentRecord } from '@quipkeep/core';
import { ContentAnonymizer } from './anonymizer.js';
import type {
  AnonymizerConfig,
  ComplianceAnalysis,
  ComplianceIssue,
  DataCategoryNotice,
  ExportOptions,
  PrivacyNotice,
} from './types.js';

export interface ComplianceAnalyzerConfig {
  /**
   * Phrases that mark content as being about the user's own life
   * (default: {@link DEFAULT_PERSONAL_INDICATORS})
   */
  personalIndicators?: readonly string[];
  /** Identifying-pattern rules shared with the anonymizer */
  anonymizer?: AnonymizerConfig;
}

export const DEFAULT_PERSONAL_INDICATORS: readonly string[] = [
  'my name',
  'my boss',
  'my manager',
  'my team',
  'my company',
  'my project',
  'my client',
  'our company',
  'our team',
];

/** Categories every export carries, with their sensitivity */
export const ALWAYS_INCLUDED_CATEGORIES: readonly DataCategoryNotice[] = [
  { category: 'contentRecords', sensitivity: 'medium' },
  { category: 'favorites', sensitivity: 'low' },
  { category: 'preferences', sensitivity: 'low' },
  { category: 'exportMetadata', sensitivity: 'low' },
];

export class ComplianceAnalyzer {
  private readonly indicators: readonly string[];
  private readonly anonymizer: ContentAnonymizer;

  constructor(config: ComplianceAnalyzerConfig = {}) {
    this.indicators = (config.personalIndicators ?? DEFAULT_PERSONAL_INDICATORS).map((p) =>
      p.toLowerCase()
    );
    this.anonymizer = new ContentAnonymizer(config.anonymizer);
  }

  /**
   * Build the privacy notice and issue list for `options`.
   */
  analyze(options: ExportOptions): ComplianceAnalysis {
    const issues: ComplianceIssue[] = [];
    const optionalIncluded: DataCategoryNotice[] = [];

    if (options.includeCredentials) {
      optionalIncluded.push({ category: 'credentials', sensitivity: 'high' });
      issues.push({
        category: 'sensitiveDataIncluded',
        severity: 'high',
        description: 'The export will contain API credentials and endpoint configuration.',
        recommendation: 'Exclude credentials unless the file stays on a device you control.',
      });
    }

    if (options.includeDeviceInfo) {
      optionalIncluded.push({ category: 'deviceInfo', sensitivity: 'low' });
      issues.push({
        category: 'deviceInfoIncluded',
        severity: 'low',
        description: 'The export will contain the device platform, OS version and app build.',
        recommendation: 'Exclude device information when sharing the file with others.',
      });
    }

    if (options.includeUsageStatistics) {
      optionalIncluded.push({ category: 'usageStatistics', sensitivity: 'low' });
    }

    if (options.anonymize) {
      issues.push({
        category: 'heuristicAnonymization',
        severity: 'medium',
        description:
          'Anonymization replaces names, emails, phone numbers and similar patterns. It cannot find every personal reference.',
        recommendation: 'Review the exported content before sharing it publicly.',
      });
    }

    const notice: PrivacyNotice = {
      alwaysIncluded: ALWAYS_INCLUDED_CATEGORIES,
      optionalIncluded,
      recommendations: buildRecommendations(options),
    };

    return { notice, issues };
  }

  /**
   * {@link analyze} plus a scan of the records that will be exported.
   * Adds a medium `personalContentDetected` issue when some content looks
   * personal and anonymization is off.
   */
  analyzeContent(records: readonly ContentRecord[], options: ExportOptions): ComplianceAnalysis {
    const analysis = this.analyze(options);
    if (options.anonymize) return analysis;

    const flagged = records.filter((r) => this.looksPersonal(r.content)).length;
    if (flagged === 0) return analysis;

    return {
      notice: analysis.notice,
      issues: [
        ...analysis.issues,
        {
          category: 'personalContentDetected',
          severity: 'medium',
          description: `${flagged} of ${records.length} records appear to reference people, organizations or contact details.`,
          recommendation: 'Enable anonymization or review these records before exporting.',
        },
      ],
    };
  }

  /** True when any issue is high severity */
  requiresAcknowledgement(issues: readonly ComplianceIssue[]): boolean {
    return issues.some((issue) => issue.severity === 'high');
  }

  /** Whether `content` matches a personal phrase or an identifying pattern */
  looksPersonal(content: string): boolean {
    const lower = content.toLowerCase();
    if (this.indicators.some((phrase) => lower.includes(phrase))) return true;
    return this.anonymizer.containsIdentifyingContent(content);
  }
}

function buildRecommendations(options: ExportOptions): string[] {
  const recommendations: string[] = [];

  if (options.includeCredentials) {
    recommendations.push('Store this export securely; it contains credentials.');
  }
  if (options.includeDeviceInfo || options.includeCredentials) {
    recommendations.push('Use the secure export preset before sharing this file.');
  }
  if (!options.anonymize) {
    recommendations.push('Content is exported verbatim. Enable anonymization to redact identifying details.');
  }

  return recommendations;
}

export function createComplianceAnalyzer(config?: ComplianceAnalyzerConfig): ComplianceAnalyzer {
  return new ComplianceAnalyzer(config);
}
