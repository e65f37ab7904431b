import type {
  Feature,
  LineString as GeoJsonLineString,
  Point as GeoJsonPoint,
  Polygon as GeoJsonPolygon,
} from 'geojson';
import type {
  ClusterMarker,
  ClusterMarkerProperties,
  ClusterPolygon,
  ClusterPolygonProperties,
  ClusterRecord,
  ClusterTopTags,
  LegendEntry,
  Point,
} from '../types.js';
import type { MapLayers, MarkerGroup, ResolvedConfig } from './types.js';
import { closeRing, convexHull } from './convex-hull.js';
import { colorForCluster, createClusterColorScale, type ClusterColorScale } from './color-scale.js';
import { clusterTooltip, markerPopup } from './popups.js';
import { groupByCluster, listClusterIds, toPoint } from './records.js';

export const SIMILAR_GROUP: MarkerGroup = { name: 'Similar year (circles)', shape: 'circle' };
export const NON_SIMILAR_GROUP: MarkerGroup = { name: 'Not similar year (squares)', shape: 'square' };

/**
 * One hull polygon per non-noise cluster. Clusters with fewer than 3 distinct points are skipped;
 * collinear clusters keep their two-vertex hull.
 */
export function buildClusterPolygons(
  records: readonly ClusterRecord[],
  clusterIds: readonly number[],
  topTags: ClusterTopTags,
  scale: ClusterColorScale | null,
  config: ResolvedConfig,
): ClusterPolygon[] {
  const groups = groupByCluster(records);
  const polygons: ClusterPolygon[] = [];

  for (const clusterId of clusterIds) {
    const clusterRecords = groups.get(clusterId) ?? [];
    const hull = convexHull(clusterRecords.map(toPoint));
    if (hull.length === 0) continue;

    const tags = topTags.get(clusterId) ?? [];
    polygons.push({
      clusterId,
      size: clusterRecords.length,
      color: colorForCluster(scale, clusterId, config.noiseClusterId),
      tags,
      tooltip: clusterTooltip(clusterId, clusterRecords.length, tags),
      hull,
      latLngs: hull.map((p): [number, number] => [p.y, p.x]),
    });
  }

  return polygons;
}

/** One marker per record, in input order. Noise only when showNoise is set. */
export function buildClusterMarkers(
  records: readonly ClusterRecord[],
  scale: ClusterColorScale | null,
  config: ResolvedConfig,
): ClusterMarker[] {
  if (!config.showPoints) return [];

  const markers: ClusterMarker[] = [];
  for (const record of records) {
    const isNoise = record.cluster === config.noiseClusterId;
    if (isNoise && !config.showNoise) continue;

    markers.push({
      clusterId: record.cluster,
      lat: record.lat,
      long: record.long,
      color: colorForCluster(scale, record.cluster, config.noiseClusterId),
      shape: record.similarYear ? SIMILAR_GROUP.shape : NON_SIMILAR_GROUP.shape,
      popup: markerPopup(record.cluster, record.url),
    });
  }
  return markers;
}

/** A Polygon needs a ring of at least 4 positions, so a two-vertex hull becomes a LineString. */
function hullGeometry(hull: readonly Point[]): GeoJsonPolygon | GeoJsonLineString {
  if (hull.length < 3) {
    return { type: 'LineString', coordinates: hull.map(p => [p.x, p.y]) };
  }
  return { type: 'Polygon', coordinates: [closeRing(hull).map(p => [p.x, p.y])] };
}

function polygonFeature(
  polygon: ClusterPolygon,
): Feature<GeoJsonPolygon | GeoJsonLineString, ClusterPolygonProperties> {
  return {
    type: 'Feature',
    properties: {
      kind: 'cluster',
      clusterId: polygon.clusterId,
      size: polygon.size,
      color: polygon.color,
      tags: polygon.tags,
      tooltip: polygon.tooltip,
    },
    geometry: hullGeometry(polygon.hull),
  };
}

function markerFeature(marker: ClusterMarker): Feature<GeoJsonPoint, ClusterMarkerProperties> {
  return {
    type: 'Feature',
    properties: {
      kind: 'point',
      clusterId: marker.clusterId,
      color: marker.color,
      shape: marker.shape,
      popup: marker.popup,
    },
    geometry: {
      type: 'Point',
      coordinates: [marker.long, marker.lat],
    },
  };
}

/** Build every layer of the map from the clustered records. */
export function buildMapLayers(
  records: readonly ClusterRecord[],
  topTags: ClusterTopTags,
  config: ResolvedConfig,
): MapLayers {
  const clusterIds = listClusterIds(records, config.noiseClusterId);
  const scale = createClusterColorScale(clusterIds);

  const polygons = buildClusterPolygons(records, clusterIds, topTags, scale, config);
  const markers = buildClusterMarkers(records, scale, config);
  const legend: LegendEntry[] = clusterIds.map(clusterId => ({
    clusterId,
    color: colorForCluster(scale, clusterId, config.noiseClusterId),
  }));

  return {
    polygons,
    markers,
    legend,
    geojson: {
      type: 'FeatureCollection',
      features: [...polygons.map(polygonFeature), ...markers.map(markerFeature)],
    },
  };
}
