#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import type { ClusterMapConfig } from './types.js';
import type { Logger } from './internal/types.js';
import { createClusterMap, DEFAULT_CONFIG } from './cluster-map.js';
import { parseClusterRecords } from './internal/records.js';
import { getClusterTopTags } from './internal/tag-frequency.js';
import { ClusterMapError } from './errors.js';

const USAGE = 'Usage: cluster-hull-map <records.json> --year <year> [--out <dir>] [--top-tags <n>] '
  + '[--exclude-tag <tag>]... [--no-points] [--show-noise]';

export interface CliOptions {
  inputPath: string;
  year: string;
  topTags: number;
  excludeTags: Set<string>;
  config: ClusterMapConfig;
}

function requireValue(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('--')) {
    throw new ClusterMapError(`Missing value for ${flag}\n${USAGE}`);
  }
  return value;
}

/** Parse command-line arguments (without the node and script entries). */
export function parseCliArgs(args: string[]): CliOptions {
  let inputPath: string | undefined;
  let year: string | undefined;
  let topTags = 5;
  const excludeTags = new Set<string>();
  const config: ClusterMapConfig = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--year':
        year = requireValue(args, ++i, arg);
        break;
      case '--out':
        config.saveDir = requireValue(args, ++i, arg);
        break;
      case '--top-tags': {
        const raw = requireValue(args, ++i, arg);
        if (!/^\d+$/.test(raw)) {
          throw new ClusterMapError(`Invalid --top-tags value: ${raw}`);
        }
        topTags = Number.parseInt(raw, 10);
        break;
      }
      case '--exclude-tag':
        excludeTags.add(requireValue(args, ++i, arg));
        break;
      case '--no-points':
        config.showPoints = false;
        break;
      case '--show-noise':
        config.showNoise = true;
        break;
      default:
        if (arg.startsWith('--') || inputPath !== undefined) {
          throw new ClusterMapError(`Unexpected argument: ${arg}\n${USAGE}`);
        }
        inputPath = arg;
    }
  }

  if (inputPath === undefined) throw new ClusterMapError(`Missing records file\n${USAGE}`);
  if (year === undefined) throw new ClusterMapError(`Missing --year\n${USAGE}`);

  return { inputPath, year, topTags, excludeTags, config };
}

/** Read the records file, summarize tags and write the map. Resolves to the output path. */
export async function run(args: string[], logger: Logger = console): Promise<string> {
  const options = parseCliArgs(args);

  const text = await readFile(options.inputPath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ClusterMapError(`Cannot parse ${options.inputPath} as JSON`, err);
  }

  const records = parseClusterRecords(raw);
  const noiseClusterId = options.config.noiseClusterId ?? DEFAULT_CONFIG.noiseClusterId;
  const topTags = getClusterTopTags(records, options.excludeTags, options.topTags, noiseClusterId);

  const { result, outputPath } = await createClusterMap(records, topTags, options.year, options.config, logger);
  logger.log(`Clusters: ${result.legend.length}, polygons: ${result.polygons.length}, markers: ${result.markers.length}`);
  return outputPath;
}

/**
 * Whether `moduleUrl` is the script node was started with. The entry is resolved
 * through symlinks first, since npm starts bins from a link in node_modules/.bin.
 */
export function isMainModule(moduleUrl: string, entry: string | undefined = process.argv[1]): boolean {
  if (entry === undefined) return false;

  let resolved: string;
  try {
    resolved = realpathSync(entry);
  } catch {
    // No such file on disk (e.g. `node -e`): nothing to compare against
    return false;
  }
  return moduleUrl === pathToFileURL(resolved).href;
}

if (isMainModule(import.meta.url)) {
  run(process.argv.slice(2)).catch((err: unknown) => {
    if (err instanceof ClusterMapError) {
      console.error(err.message);
      if (err.details !== undefined) console.error(err.details);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
}
