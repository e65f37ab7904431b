import type { ClusterRecord, ClusterTopTags } from '../types.js';
import { groupByCluster } from './records.js';

/**
 * Get the top N tags for each cluster, skipping the noise cluster.
 *
 * Tags in `tagsToDelete` are ignored. Ties keep the order in which the tags were
 * first encountered. Clusters without any remaining tag map to an empty list.
 */
export function getClusterTopTags(
  records: readonly ClusterRecord[],
  tagsToDelete: ReadonlySet<string>,
  nTopTags: number = 5,
  noiseClusterId: number = -1,
): ClusterTopTags {
  const topTags: ClusterTopTags = new Map();

  for (const [clusterId, clusterRecords] of groupByCluster(records)) {
    if (clusterId === noiseClusterId) continue;

    const counts = new Map<string, number>();
    for (const record of clusterRecords) {
      for (const tag of record.tags) {
        if (tagsToDelete.has(tag)) continue;
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    // Array.prototype.sort is stable, so equal counts stay in insertion order
    const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
    topTags.set(clusterId, ranked.slice(0, Math.max(0, nTopTags)).map(([tag]) => tag));
  }

  return topTags;
}
