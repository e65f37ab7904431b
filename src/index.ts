// Core
export { ClusterMapBuilder, buildClusterMap, createClusterMap, DEFAULT_CONFIG } from './cluster-map.js';
export { convexHull, closeRing } from './internal/convex-hull.js';
export { getClusterTopTags } from './internal/tag-frequency.js';
export { parseClusterRecords } from './internal/records.js';
export { ClusterMapError } from './errors.js';

// Types
export type {
  Point,
  ClusterRecord,
  ClusterTopTags,
  ClusterMapConfig,
  MarkerShape,
  ClusterPolygon,
  ClusterMarker,
  LegendEntry,
  ClusterPolygonProperties,
  ClusterMarkerProperties,
  ClusterMapGeoJson,
  ClusterMapResult,
} from './types.js';
