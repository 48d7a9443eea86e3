import { CONTENT_CATEGORIES, type ContentRecord } from '@quipkeep/core';
import { firstValueFrom, toArray, type Observable } from 'rxjs';
import type { DataInterchangeConfig } from '../config.js';
import type { Snapshot, SnapshotRecord } from '../snapshot-schema.js';
import type { OperationPhase, OperationProgress, PipelineEvent } from '../types.js';

export const TEST_CONFIG: DataInterchangeConfig = {
  appVersion: '2.1.0',
  deviceInfo: { platform: 'test', osVersion: '1.0', appBuild: '210' },
};

export const EXPORT_TIME = '2024-03-01T10:00:00.000Z';

export function record(id: string, overrides: Partial<ContentRecord> = {}): ContentRecord {
  return {
    id,
    content: `Snippet ${id}`,
    category: 'meetings',
    intensity: 3,
    locale: 'en',
    createdAt: '2024-02-01T09:00:00.000Z',
    isFavorite: false,
    ...overrides,
  };
}

/** `count` records r0..r{count-1} spread over every category, one day apart */
export function records(count: number, prefix = 'r'): ContentRecord[] {
  return Array.from({ length: count }, (_, i) =>
    record(`${prefix}${i}`, {
      content: `Snippet number ${i} from ${prefix}`,
      category: CONTENT_CATEGORIES[i % CONTENT_CATEGORIES.length] ?? 'general',
      intensity: (i % 5) + 1,
      createdAt: new Date(Date.UTC(2024, 0, 1 + i)).toISOString(),
    })
  );
}

export function snapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  const contentRecords: SnapshotRecord[] = [
    record('s1', { isFavorite: true }),
    record('s2', { category: 'deadlines', intensity: 5 }),
  ];
  return {
    schemaVersion: 2,
    appVersion: '2.1.0',
    exportTimestamp: EXPORT_TIME,
    deviceInfo: { platform: 'test', osVersion: '1.0', appBuild: '210' },
    contentRecords,
    favoriteIds: ['s1'],
    preferences: { language: 'en' },
    usageStatistics: null,
    checksum: null,
    ...overrides,
  };
}

export function bytesOf(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

export interface Collected<T> {
  progress: OperationProgress[];
  result: T;
}

/** Run a pipeline to completion */
export async function collect<T>(source$: Observable<PipelineEvent<T>>): Promise<Collected<T>> {
  const events = await firstValueFrom(source$.pipe(toArray()));
  const progress: OperationProgress[] = [];
  let result: { value: T } | null = null;
  for (const event of events) {
    if (event.kind === 'progress') progress.push(event.progress);
    else result = { value: event.result };
  }
  if (!result) {
    throw new Error('Pipeline completed without a result');
  }
  return { progress, result: result.value };
}

/** Run a pipeline that is expected to fail */
export function collectFailure<T>(
  source$: Observable<PipelineEvent<T>>
): Promise<{ progress: OperationProgress[]; error: unknown }> {
  return new Promise((resolve, reject) => {
    const progress: OperationProgress[] = [];
    source$.subscribe({
      next: (event) => {
        if (event.kind === 'progress') progress.push(event.progress);
      },
      error: (error: unknown) => resolve({ progress, error }),
      complete: () => reject(new Error('Expected the pipeline to fail')),
    });
  });
}

/** Phases in the order they were entered, without repeats */
export function phaseSequence(progress: readonly OperationProgress[]): OperationPhase[] {
  const phases: OperationPhase[] = [];
  for (const { phase } of progress) {
    if (phases[phases.length - 1] !== phase) phases.push(phase);
  }
  return phases;
}
