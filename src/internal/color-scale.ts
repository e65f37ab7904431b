import { scaleLinear } from 'd3-scale';
import { schemePaired } from 'd3-scale-chromatic';

/** Colour for noise, and for every cluster when no scale can be built. */
export const FALLBACK_COLOR = 'gray';

export type ClusterColorScale = (clusterId: number) => string;

/**
 * Linear colour scale over the cluster ids: the 12 "Paired" colours spread
 * evenly from the smallest to the largest id. Returns null when there are no ids.
 */
export function createClusterColorScale(clusterIds: readonly number[]): ClusterColorScale | null {
  if (clusterIds.length === 0) return null;

  const min = Math.min(...clusterIds);
  const max = Math.max(...clusterIds);
  // A single id still needs a non-empty domain
  const span = max > min ? max - min : 1;

  const lastStop = schemePaired.length - 1;
  const stops = schemePaired.map((_, i) => min + (span * i) / lastStop);

  const scale = scaleLinear<string>()
    .domain(stops)
    .range(schemePaired)
    .clamp(true);

  return (clusterId: number) => scale(clusterId);
}

/** Colour of a cluster, with noise and missing scales falling back to gray. */
export function colorForCluster(
  scale: ClusterColorScale | null,
  clusterId: number,
  noiseClusterId: number,
): string {
  if (scale === null || clusterId === noiseClusterId) return FALLBACK_COLOR;
  return scale(clusterId);
}
