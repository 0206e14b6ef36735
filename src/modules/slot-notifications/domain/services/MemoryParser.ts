import type { Asset, AssetType, MemoryRecord, ParsedMemories, YearMemories } from '../types';

/** How many memories test mode inspects when looking for another date */
const TEST_DATE_SCAN_LIMIT = 10;

/**
 * Keeps memories whose show date starts with the ISO date `date` (YYYY-MM-DD)
 */
export function filterForDate(memories: readonly MemoryRecord[], date: string): MemoryRecord[] {
  return memories.filter((memory) => (memory.showAt ?? '').startsWith(date));
}

/**
 * Groups memory assets by year.
 *
 * Memories without a year are skipped, assets without an id are dropped and
 * assets without a type count as images. Years come out newest first.
 */
export function parseMemories(memories: readonly MemoryRecord[]): ParsedMemories {
  const byYear = new Map<number, YearMemories>();
  let imageCount = 0;
  let videoCount = 0;

  for (const memory of memories) {
    if (!memory.year) {
      continue;
    }

    for (const raw of memory.assets) {
      if (!raw.id) {
        continue;
      }

      const asset: Asset = { id: raw.id, type: toAssetType(raw.type), createdAt: null };
      const bucket = byYear.get(memory.year) ?? { images: 0, videos: 0, assets: [] };
      bucket.assets.push(asset);

      if (asset.type === 'VIDEO') {
        bucket.videos++;
        videoCount++;
      } else {
        bucket.images++;
        imageCount++;
      }
      byYear.set(memory.year, bucket);
    }
  }

  return {
    totalAssets: imageCount + videoCount,
    imageCount,
    videoCount,
    years: [...byYear.keys()].sort((a, b) => b - a),
    byYear,
  };
}

/**
 * Test-mode helper: the first date among the first few memories that has any
 * memories at all, or null when none does.
 */
export function findAlternateDate(memories: readonly MemoryRecord[]): string | null {
  for (const memory of memories.slice(0, TEST_DATE_SCAN_LIMIT)) {
    const date = (memory.showAt ?? '').slice(0, 10);
    if (/^\d{4}-\d{2}-\d{2}$/.test(date) && filterForDate(memories, date).length > 0) {
      return date;
    }
  }
  return null;
}

export function toAssetType(type: string | null | undefined): AssetType {
  return type === 'VIDEO' ? 'VIDEO' : 'IMAGE';
}
