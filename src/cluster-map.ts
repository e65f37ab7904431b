import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ClusterMapConfig, ClusterMapResult, ClusterRecord, ClusterTopTags } from './types.js';
import type { Logger, ResolvedConfig } from './internal/types.js';
import { buildMapLayers, NON_SIMILAR_GROUP, SIMILAR_GROUP } from './internal/map-layers.js';
import { generateMapHtml } from './internal/html-generator.js';

/** Default configuration values. */
export const DEFAULT_CONFIG: ResolvedConfig = {
  center: [45.7615, 4.83],
  zoomStart: 16,
  showPoints: true,
  showNoise: false,
  noiseClusterId: -1,
  saveDir: './data/explore/',
  tileUrl: 'https://tile.openstreetmap.org/{z}/{x}/{y}.png',
  tileAttribution: '&copy; OpenStreetMap contributors',
  polygonWeight: 3,
  polygonFillOpacity: 0.2,
  markerRadius: 6,
  markerFillOpacity: 0.55,
};

/** Resolve a partial config into a full config. Keys left undefined keep their default. */
function resolveConfig(config: ClusterMapConfig = {}): ResolvedConfig {
  return {
    center: config.center ?? DEFAULT_CONFIG.center,
    zoomStart: config.zoomStart ?? DEFAULT_CONFIG.zoomStart,
    showPoints: config.showPoints ?? DEFAULT_CONFIG.showPoints,
    showNoise: config.showNoise ?? DEFAULT_CONFIG.showNoise,
    noiseClusterId: config.noiseClusterId ?? DEFAULT_CONFIG.noiseClusterId,
    saveDir: config.saveDir ?? DEFAULT_CONFIG.saveDir,
    tileUrl: config.tileUrl ?? DEFAULT_CONFIG.tileUrl,
    tileAttribution: config.tileAttribution ?? DEFAULT_CONFIG.tileAttribution,
    polygonWeight: config.polygonWeight ?? DEFAULT_CONFIG.polygonWeight,
    polygonFillOpacity: config.polygonFillOpacity ?? DEFAULT_CONFIG.polygonFillOpacity,
    markerRadius: config.markerRadius ?? DEFAULT_CONFIG.markerRadius,
    markerFillOpacity: config.markerFillOpacity ?? DEFAULT_CONFIG.markerFillOpacity,
  };
}

/** Reusable, stateless map builder. */
export class ClusterMapBuilder {
  readonly config: ResolvedConfig;

  constructor(config?: ClusterMapConfig) {
    this.config = resolveConfig(config);
  }

  /** Build polygons, markers and the HTML page. Pure: nothing is written to disk. */
  build(records: readonly ClusterRecord[], topTags: ClusterTopTags, year: number | string): ClusterMapResult {
    const layers = buildMapLayers(records, topTags, this.config);
    const title = `${year} clusters`;

    const html = generateMapHtml({
      title,
      geojson: layers.geojson,
      legend: layers.legend,
      markerGroups: this.config.showPoints ? [SIMILAR_GROUP, NON_SIMILAR_GROUP] : [],
      config: this.config,
    });

    return {
      title,
      outputFileName: `${year}_clusters_map.html`,
      ...layers,
      html,
    };
  }

  /** Write the page under saveDir, creating it if needed. Resolves to the written path. */
  async save(result: ClusterMapResult, logger: Logger = console): Promise<string> {
    await mkdir(this.config.saveDir, { recursive: true });
    const outputPath = path.join(this.config.saveDir, result.outputFileName);
    await writeFile(outputPath, result.html, 'utf8');
    logger.log(`Cluster map saved to ${outputPath}`);
    return outputPath;
  }
}

/** Build with the given config. For repeated use, prefer creating a ClusterMapBuilder instance. */
export function buildClusterMap(
  records: readonly ClusterRecord[],
  topTags: ClusterTopTags,
  year: number | string,
  config?: ClusterMapConfig,
): ClusterMapResult {
  return new ClusterMapBuilder(config).build(records, topTags, year);
}

/** Build the map and save it in one step. */
export async function createClusterMap(
  records: readonly ClusterRecord[],
  topTags: ClusterTopTags,
  year: number | string,
  config?: ClusterMapConfig,
  logger: Logger = console,
): Promise<{ result: ClusterMapResult; outputPath: string }> {
  const builder = new ClusterMapBuilder(config);
  const result = builder.build(records, topTags, year);
  const outputPath = await builder.save(result, logger);
  return { result, outputPath };
}
