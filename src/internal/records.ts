import { z } from 'zod';
import type { ClusterRecord, Point } from '../types.js';
import { ClusterMapError } from '../errors.js';

// Numbers, or numeric strings. Blank strings, null and booleans are rejected
// rather than coerced to 0.
const numberLike = z.union([z.number(), z.string().trim().min(1)]);

const clusterRecordSchema = z.object({
  cluster: numberLike.pipe(z.coerce.number().int()),
  lat: numberLike.pipe(z.coerce.number().finite()),
  long: numberLike.pipe(z.coerce.number().finite()),
  similarYear: z
    .union([z.boolean(), z.literal(0), z.literal(1)])
    .transform(v => Boolean(v))
    .default(false),
  url: z.string().default(''),
  tags: z
    .array(z.string())
    .nullish()
    .transform(tags => tags ?? []),
});

const clusterRecordsSchema = z.array(clusterRecordSchema);

/** Validate raw rows (e.g. parsed JSON) into ClusterRecords. Coordinates and ids are coerced to numbers. */
export function parseClusterRecords(input: unknown): ClusterRecord[] {
  const result = clusterRecordsSchema.safeParse(input);
  if (!result.success) {
    throw new ClusterMapError('Invalid cluster records', result.error.issues);
  }
  return result.data;
}

/** Distinct cluster ids other than noise, ascending. */
export function listClusterIds(records: readonly ClusterRecord[], noiseClusterId: number): number[] {
  const ids = new Set<number>();
  for (const record of records) {
    if (record.cluster !== noiseClusterId) ids.add(record.cluster);
  }
  return [...ids].sort((a, b) => a - b);
}

/** Group records by cluster id, in order of first appearance. */
export function groupByCluster(records: readonly ClusterRecord[]): Map<number, ClusterRecord[]> {
  const groups = new Map<number, ClusterRecord[]>();
  for (const record of records) {
    const group = groups.get(record.cluster);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.cluster, [record]);
    }
  }
  return groups;
}

export function toPoint(record: ClusterRecord): Point {
  return { x: record.long, y: record.lat };
}
