import type {
  FeatureCollection,
  LineString as GeoJsonLineString,
  Point as GeoJsonPoint,
  Polygon as GeoJsonPolygon,
} from 'geojson';

/** A planar point. For map data, x is longitude and y is latitude. */
export interface Point {
  x: number;
  y: number;
}

/** One row of the clustered point table. */
export interface ClusterRecord {
  /** Cluster identifier assigned upstream. -1 marks noise by default. */
  cluster: number;
  lat: number;
  long: number;
  /** Drawn as a circle when true, as a square otherwise. */
  similarYear: boolean;
  /** Link shown in the marker popup. */
  url: string;
  /** Descriptive labels; may be empty. */
  tags: string[];
}

/** Top tags per cluster id, as produced by getClusterTopTags(). */
export type ClusterTopTags = Map<number, string[]>;

/** Optional knobs, set on the ClusterMapBuilder constructor. */
export interface ClusterMapConfig {
  /** Initial map centre as [lat, long]. Default: [45.7615, 4.83] */
  center?: [number, number];
  /** Initial zoom level. Default: 16 */
  zoomStart?: number;
  /** Draw a marker per record. Default: true */
  showPoints?: boolean;
  /** Also draw markers for noise records. Default: false */
  showNoise?: boolean;
  /** Cluster id treated as noise. Default: -1 */
  noiseClusterId?: number;
  /** Directory the HTML file is written to. Default: './data/explore/' */
  saveDir?: string;
  /** Tile URL template. Default: OpenStreetMap */
  tileUrl?: string;
  tileAttribution?: string;
  /** Hull outline width in pixels. Default: 3 */
  polygonWeight?: number;
  /** Default: 0.2 */
  polygonFillOpacity?: number;
  /** Marker radius in pixels. Default: 6 */
  markerRadius?: number;
  /** Default: 0.55 */
  markerFillOpacity?: number;
}

export type MarkerShape = 'circle' | 'square';

/** A hull polygon drawn for one cluster. */
export interface ClusterPolygon {
  clusterId: number;
  /** Number of records in the cluster, duplicates included. */
  size: number;
  color: string;
  tags: string[];
  tooltip: string;
  /** Open counter-clockwise hull in x/y (long/lat). Two vertices when the cluster is collinear. */
  hull: Point[];
  /** Same vertices as [lat, long] pairs. */
  latLngs: [number, number][];
}

/** A marker drawn for one record. */
export interface ClusterMarker {
  clusterId: number;
  lat: number;
  long: number;
  color: string;
  shape: MarkerShape;
  popup: string;
}

export interface LegendEntry {
  clusterId: number;
  color: string;
}

export interface ClusterPolygonProperties {
  kind: 'cluster';
  clusterId: number;
  size: number;
  color: string;
  tags: string[];
  tooltip: string;
}

export interface ClusterMarkerProperties {
  kind: 'point';
  clusterId: number;
  color: string;
  shape: MarkerShape;
  popup: string;
}

/** Clusters become Polygons, or LineStrings when their points are collinear; records become Points. */
export type ClusterMapGeoJson = FeatureCollection<
  GeoJsonPolygon | GeoJsonLineString | GeoJsonPoint,
  ClusterPolygonProperties | ClusterMarkerProperties
>;

/** The complete result returned by ClusterMapBuilder.build(). */
export interface ClusterMapResult {
  title: string;
  /** "<year>_clusters_map.html" */
  outputFileName: string;
  /** Ascending cluster id; clusters without a hull are absent. */
  polygons: ClusterPolygon[];
  /** Same order as the input records. */
  markers: ClusterMarker[];
  legend: LegendEntry[];
  geojson: ClusterMapGeoJson;
  /** Standalone Leaflet page. */
  html: string;
}
