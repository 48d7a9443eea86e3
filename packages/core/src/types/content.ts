/**
 * Content categories a generated snippet can belong to
 */
export const CONTENT_CATEGORIES = [
  'deadlines',
  'meetings',
  'kpis',
  'code_reviews',
  'workload',
  'colleagues',
  'management',
  'general',
] as const;

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

/**
 * Inclusive bounds of a record's intensity level
 */
export const INTENSITY_RANGE = { min: 1, max: 5 } as const;

/**
 * A single generated snippet as held in local state.
 */
export interface ContentRecord {
  /** Stable unique identifier */
  id: string;
  content: string;
  category: ContentCategory;
  /** Integer within {@link INTENSITY_RANGE} */
  intensity: number;
  /** Language code the snippet was generated in */
  locale: string;
  /** ISO-8601 creation timestamp */
  createdAt: string;
  isFavorite: boolean;
}

export type PreferenceValue = string | number | boolean | string[] | null;

/**
 * User preferences as a flat key/value map, e.g.
 * `{ 'language': 'en', 'notifications.enabled': true }`.
 */
export type PreferenceMap = Record<string, PreferenceValue>;

/**
 * Preference keys under this prefix hold credentials or endpoint
 * configuration for the content-generation client.
 */
export const CREDENTIAL_PREFERENCE_PREFIX = 'api.';

export function isCredentialPreferenceKey(key: string): boolean {
  return key.startsWith(CREDENTIAL_PREFERENCE_PREFIX);
}

export function isContentCategory(value: string): value is ContentCategory {
  return (CONTENT_CATEGORIES as readonly string[]).includes(value);
}
