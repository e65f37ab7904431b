import type { ClusterMapGeoJson, LegendEntry } from '../types.js';
import type { MarkerGroup, ResolvedConfig } from './types.js';
import { escapeHtml } from './popups.js';

const LEAFLET_VERSION = '1.9.4';
const LEAFLET_CSS = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.css`;
const LEAFLET_JS = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist/leaflet.js`;

export interface MapDocument {
  title: string;
  geojson: ClusterMapGeoJson;
  legend: LegendEntry[];
  /** Overlay groups for the markers; empty when points are hidden. */
  markerGroups: MarkerGroup[];
  config: ResolvedConfig;
}

/** Serialize a value for a <script> block. `<` is escaped so the data cannot close the tag. */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

/** Generate the HTML legend rows, one swatch per cluster. */
export function generateLegendHtml(legend: readonly LegendEntry[]): string {
  if (legend.length === 0) return '';

  const rows = legend.map(entry =>
    `<div><span style="display:inline-block;width:12px;height:12px;margin-right:4px;background:${escapeHtml(entry.color)}"></span>Cluster ${entry.clusterId}</div>`
  );
  return `<div class="cluster-legend">${rows.join('')}</div>`;
}

/** Generate a standalone Leaflet page for the map. */
export function generateMapHtml(doc: MapDocument): string {
  const { config } = doc;
  const options = {
    center: config.center,
    zoom: config.zoomStart,
    tileUrl: config.tileUrl,
    tileAttribution: config.tileAttribution,
    polygonWeight: config.polygonWeight,
    polygonFillOpacity: config.polygonFillOpacity,
    markerRadius: config.markerRadius,
    markerFillOpacity: config.markerFillOpacity,
    markerGroups: doc.markerGroups,
  };

  const script = `
const data = ${toScriptJson(doc.geojson)};
const options = ${toScriptJson(options)};
const legendHtml = ${toScriptJson(generateLegendHtml(doc.legend))};

const map = L.map('map').setView(options.center, options.zoom);
L.tileLayer(options.tileUrl, { attribution: options.tileAttribution, maxZoom: 19 }).addTo(map);

const overlays = {};
const groups = {};
for (const group of options.markerGroups) {
  groups[group.shape] = L.featureGroup();
  overlays[group.name] = groups[group.shape];
}

for (const feature of data.features) {
  const p = feature.properties;
  if (p.kind === 'cluster') {
    const positions = feature.geometry.type === 'Polygon'
      ? feature.geometry.coordinates[0].slice(0, -1)
      : feature.geometry.coordinates;
    const latLngs = positions.map(([x, y]) => [y, x]);
    L.polygon(latLngs, {
      color: p.color,
      weight: options.polygonWeight,
      fill: true,
      fillColor: p.color,
      fillOpacity: options.polygonFillOpacity,
    }).bindTooltip(p.tooltip).addTo(map);
    continue;
  }

  const group = groups[p.shape];
  if (!group) continue;
  const [x, y] = feature.geometry.coordinates;
  const style = { color: p.color, fill: true, fillColor: p.color, fillOpacity: options.markerFillOpacity };
  const size = options.markerRadius * 2;
  const marker = p.shape === 'circle'
    ? L.circleMarker([y, x], { ...style, radius: options.markerRadius })
    : L.marker([y, x], {
        icon: L.divIcon({
          className: 'square-marker',
          html: '<div style="width:' + size + 'px;height:' + size + 'px;border:2px solid ' + p.color
            + ';background:' + p.color + ';opacity:' + options.markerFillOpacity + '"></div>',
          iconSize: [size, size],
        }),
      });
  marker.bindPopup(p.popup).addTo(group);
}

for (const group of Object.values(groups)) group.addTo(map);
L.control.layers(null, overlays).addTo(map);

if (legendHtml) {
  const legend = L.control({ position: 'bottomright' });
  legend.onAdd = () => {
    const div = L.DomUtil.create('div', 'leaflet-bar');
    div.style.background = 'white';
    div.style.padding = '6px';
    div.innerHTML = legendHtml;
    return div;
  };
  legend.addTo(map);
}
`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8" />
  <title>${escapeHtml(doc.title)}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <link rel="stylesheet" href="${LEAFLET_CSS}" />
  <script src="${LEAFLET_JS}"></script>
  <style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
  <div id="map"></div>
  <script>${script}</script>
</body>
</html>
`;
}
