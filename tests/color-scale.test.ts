import { describe, it, expect } from 'vitest';
import { createClusterColorScale, colorForCluster, FALLBACK_COLOR } from '../src/internal/color-scale.js';

// First and last colours of the "Paired" scheme: #a6cee3 and #b15928
const FIRST_COLOR = 'rgb(166, 206, 227)';
const LAST_COLOR = 'rgb(177, 89, 40)';

describe('createClusterColorScale', () => {
  it('returns null without cluster ids', () => {
    expect(createClusterColorScale([])).toBeNull();
  });

  it('maps the smallest and largest ids to the ends of the scheme', () => {
    const scale = createClusterColorScale([3, 1, 2]);
    expect(scale).not.toBeNull();
    expect(scale?.(1)).toBe(FIRST_COLOR);
    expect(scale?.(3)).toBe(LAST_COLOR);
  });

  it('gives intermediate ids an intermediate colour', () => {
    const scale = createClusterColorScale([1, 2, 3]);
    const middle = scale?.(2);
    expect(middle).toMatch(/^rgb\(\d+, \d+, \d+\)$/);
    expect(middle).not.toBe(FIRST_COLOR);
    expect(middle).not.toBe(LAST_COLOR);
  });

  it('clamps ids outside the range', () => {
    const scale = createClusterColorScale([0, 11]);
    expect(scale?.(-5)).toBe(FIRST_COLOR);
    expect(scale?.(50)).toBe(LAST_COLOR);
  });

  it('handles a single cluster id', () => {
    const scale = createClusterColorScale([5]);
    expect(scale?.(5)).toBe(FIRST_COLOR);
  });
});

describe('colorForCluster', () => {
  it('uses gray for noise', () => {
    const scale = createClusterColorScale([0, 1]);
    expect(colorForCluster(scale, -1, -1)).toBe(FALLBACK_COLOR);
    expect(colorForCluster(scale, 0, -1)).toBe(FIRST_COLOR);
  });

  it('uses gray when there is no scale', () => {
    expect(colorForCluster(null, 4, -1)).toBe('gray');
  });
});
