import type { SnapshotRecord, UsageStatistics } from './snapshot-schema.js';

/**
 * Aggregate usage statistics over the exported records.
 */
export function computeUsageStatistics(
  records: readonly SnapshotRecord[],
  favoriteIds: readonly string[]
): UsageStatistics {
  const categoryBreakdown: Record<string, number> = {};
  let intensitySum = 0;
  let earliest: number | null = null;
  let latest: number | null = null;

  for (const record of records) {
    categoryBreakdown[record.category] = (categoryBreakdown[record.category] ?? 0) + 1;
    intensitySum += record.intensity;

    const created = Date.parse(record.createdAt);
    if (Number.isNaN(created)) continue;
    if (earliest === null || created < earliest) earliest = created;
    if (latest === null || created > latest) latest = created;
  }

  // Ties go to the category seen first
  let mostPopularCategory: string | null = null;
  let highest = 0;
  for (const [category, count] of Object.entries(categoryBreakdown)) {
    if (count > highest) {
      mostPopularCategory = category;
      highest = count;
    }
  }

  return {
    totalRecords: records.length,
    totalFavorites: favoriteIds.length,
    categoryBreakdown,
    averageIntensity:
      records.length > 0 ? Math.round((intensitySum / records.length) * 100) / 100 : 0,
    mostPopularCategory,
    dateRange:
      earliest !== null && latest !== null
        ? { earliest: new Date(earliest).toISOString(), latest: new Date(latest).toISOString() }
        : null,
  };
}
