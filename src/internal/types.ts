import type {
  ClusterMapConfig,
  ClusterMapGeoJson,
  ClusterMarker,
  ClusterPolygon,
  LegendEntry,
  MarkerShape,
} from '../types.js';

/** Resolved config with all defaults applied. */
export type ResolvedConfig = Readonly<Required<ClusterMapConfig>>;

/** Anything with a console-style log method. */
export interface Logger {
  log: (...args: unknown[]) => void;
}

/** A toggleable overlay holding the markers of one shape. */
export interface MarkerGroup {
  name: string;
  shape: MarkerShape;
}

/** Everything drawn on one map, before it is rendered to HTML. */
export interface MapLayers {
  polygons: ClusterPolygon[];
  markers: ClusterMarker[];
  legend: LegendEntry[];
  geojson: ClusterMapGeoJson;
}
