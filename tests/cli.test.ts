import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, realpath, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { isMainModule, parseCliArgs, run } from '../src/cli.js';
import { ClusterMapError } from '../src/index.js';

describe('parseCliArgs', () => {
  it('parses the input file and flags', () => {
    const options = parseCliArgs([
      'points.json',
      '--year', '2018',
      '--out', 'maps',
      '--top-tags', '3',
      '--exclude-tag', 'lyon',
      '--exclude-tag', 'france',
      '--no-points',
      '--show-noise',
    ]);

    expect(options.inputPath).toBe('points.json');
    expect(options.year).toBe('2018');
    expect(options.topTags).toBe(3);
    expect([...options.excludeTags]).toEqual(['lyon', 'france']);
    expect(options.config).toEqual({ saveDir: 'maps', showPoints: false, showNoise: true });
  });

  it('defaults to five top tags and no overrides', () => {
    const options = parseCliArgs(['points.json', '--year', '2018']);
    expect(options.topTags).toBe(5);
    expect(options.excludeTags.size).toBe(0);
    expect(options.config).toEqual({});
  });

  it('requires a records file and a year', () => {
    expect(() => parseCliArgs(['--year', '2018'])).toThrow('Missing records file');
    expect(() => parseCliArgs(['points.json'])).toThrow('Missing --year');
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['points.json', '--year'])).toThrow('Missing value for --year');
    expect(() => parseCliArgs(['points.json', '--out', '--year', '2018'])).toThrow(ClusterMapError);
  });

  it('rejects unknown flags and extra positionals', () => {
    expect(() => parseCliArgs(['points.json', '--year', '1', '--verbose'])).toThrow('Unexpected argument: --verbose');
    expect(() => parseCliArgs(['a.json', 'b.json', '--year', '1'])).toThrow('Unexpected argument: b.json');
  });

  it('rejects an invalid top-tags count', () => {
    expect(() => parseCliArgs(['points.json', '--year', '1', '--top-tags', 'many'])).toThrow('Invalid --top-tags value: many');
    expect(() => parseCliArgs(['points.json', '--year', '1', '--top-tags', '-2'])).toThrow(ClusterMapError);
    expect(() => parseCliArgs(['points.json', '--year', '1', '--top-tags', '3abc'])).toThrow('Invalid --top-tags value: 3abc');
  });
});

describe('run', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes a map from a records file', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-cli-'));
    const inputPath = path.join(dir, 'points.json');
    const rows = [
      { cluster: 0, lat: 45.5, long: 4.5, tags: ['river', 'lyon'] },
      { cluster: 0, lat: 45.5, long: 5, tags: ['river'] },
      { cluster: 0, lat: 46, long: 5, tags: ['bridge'] },
      { cluster: -1, lat: 44, long: 3, tags: ['noise'] },
    ];
    await writeFile(inputPath, JSON.stringify(rows), 'utf8');

    const lines: string[] = [];
    const outputPath = await run(
      [inputPath, '--year', '2017', '--out', dir, '--exclude-tag', 'lyon'],
      { log: (...args: unknown[]) => { lines.push(args.join(' ')); } },
    );

    expect(outputPath).toBe(path.join(dir, '2017_clusters_map.html'));
    const html = await readFile(outputPath, 'utf8');
    expect(html).toContain('Tags: river, bridge');
    expect(lines).toEqual([
      `Cluster map saved to ${outputPath}`,
      'Clusters: 1, polygons: 1, markers: 3',
    ]);
  });

  it('reports malformed JSON', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-cli-'));
    const inputPath = path.join(dir, 'broken.json');
    await writeFile(inputPath, '[{', 'utf8');

    await expect(run([inputPath, '--year', '2017', '--out', dir], { log: () => {} }))
      .rejects.toThrow(`Cannot parse ${inputPath} as JSON`);
  });

  it('reports invalid records', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-cli-'));
    const inputPath = path.join(dir, 'bad.json');
    await writeFile(inputPath, JSON.stringify([{ cluster: 0, lat: 'x', long: 1 }]), 'utf8');

    await expect(run([inputPath, '--year', '2017', '--out', dir], { log: () => {} }))
      .rejects.toBeInstanceOf(ClusterMapError);
  });
});

describe('isMainModule', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('matches the script started directly', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-main-'));
    const script = path.join(dir, 'cli.js');
    await writeFile(script, '', 'utf8');
    const moduleUrl = pathToFileURL(await realpath(script)).href;

    expect(isMainModule(moduleUrl, script)).toBe(true);
  });

  it('matches the script started through a bin symlink', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-main-'));
    const script = path.join(dir, 'cli.js');
    const link = path.join(dir, 'cluster-hull-map');
    await writeFile(script, '', 'utf8');
    await symlink(script, link);
    const moduleUrl = pathToFileURL(await realpath(script)).href;

    expect(isMainModule(moduleUrl, link)).toBe(true);
  });

  it('does not match another script', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cluster-main-'));
    const script = path.join(dir, 'cli.js');
    const other = path.join(dir, 'other.js');
    await writeFile(script, '', 'utf8');
    await writeFile(other, '', 'utf8');

    expect(isMainModule(pathToFileURL(await realpath(script)).href, other)).toBe(false);
  });

  it('does not match an entry missing from disk', () => {
    expect(isMainModule(import.meta.url, path.join(tmpdir(), 'missing-entry-script.js'))).toBe(false);
  });
});
