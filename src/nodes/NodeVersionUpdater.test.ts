import { describe, it, expect, vi, afterEach } from 'vitest';
import { createMockNode, selectionOf, type MockNodeAdapter } from '../../test/mocks';
import { createTempTree, frameList, type TempTree } from '../../test/utils';
import { DirectoryListingCache } from '../scanner/DirectoryListingCache';
import { FrameRangeScanner } from '../scanner/FrameRangeScanner';
import { VersionSetResolver } from '../scanner/VersionSetResolver';
import { NodeVersionUpdater, type NodeUpdateOptions } from './NodeVersionUpdater';

describe('NodeVersionUpdater', () => {
  let tree: TempTree | null = null;

  afterEach(() => {
    tree?.remove();
    tree = null;
  });

  function setup(): TempTree {
    tree = createTempTree();
    for (const f of frameList(1001, 1003)) tree.touch(`plate_v001/plate.${f}.exr`);
    for (const f of frameList(1001, 1005, [1004])) tree.touch(`plate_v002/plate.${f}.exr`);
    tree.touch('matte/matte_v001.1001.exr', 'matte/matte_v003.1001.exr');
    return tree;
  }

  function createUpdater(
    t: TempTree,
    nodes: MockNodeAdapter[],
    overrides: Partial<NodeUpdateOptions> = {},
    onWarning: (message: string) => void = () => {}
  ): NodeVersionUpdater {
    const listings = new DirectoryListingCache();
    return new NodeVersionUpdater(
      selectionOf(...nodes),
      { changeRange: true, setMissing: false, baseDir: t.root, ...overrides },
      new VersionSetResolver(listings),
      new FrameRangeScanner(listings, t.root),
      onWarning
    );
  }

  function nodesFor(t: TempTree): { plate: MockNodeAdapter; matte: MockNodeAdapter; slate: MockNodeAdapter } {
    return {
      plate: createMockNode({
        name: 'plate',
        path: t.resolve('plate_v001/plate.%04d.exr'),
        range: { first: 1001, last: 1003 },
      }),
      matte: createMockNode({ name: 'matte', path: 'matte/matte_v001.%04d.exr' }),
      slate: createMockNode({ name: 'slate', path: '/elsewhere/slate.exr', range: { first: 1, last: 1 } }),
    };
  }

  it('NVU-001: moves each node to its own listing of the version', () => {
    const t = setup();
    const { plate, matte, slate } = nodesFor(t);
    const updater = createUpdater(t, [plate, matte, slate]);

    expect(updater.versionedCount).toBe(2);
    const results = updater.applyVersion(3);

    expect(results.map((r) => r.outcome)).toEqual(['kept', 'updated', 'skipped']);
    expect(matte.path).toBe('matte/matte_v003.%04d.exr');
    expect(matte.setFrameRange).not.toHaveBeenCalled();
    expect(slate.setPathValue).not.toHaveBeenCalled();
  });

  it('NVU-002: updates the frame range from disk for nodes that have one', () => {
    const t = setup();
    const { plate } = nodesFor(t);
    const updater = createUpdater(t, [plate]);

    const [result] = updater.applyVersion(2);

    expect(result).toEqual({
      label: 'plate',
      outcome: 'updated',
      path: t.resolve('plate_v002/plate.%04d.exr'),
      range: { first: 1001, last: 1005 },
    });
    expect(plate.range).toEqual({ first: 1001, last: 1005 });
  });

  it('NVU-003: leaves the range alone when range changes are off', () => {
    const t = setup();
    const { plate } = nodesFor(t);
    const updater = createUpdater(t, [plate], { changeRange: false });

    updater.applyVersion(2);

    expect(plate.path).toBe(t.resolve('plate_v002/plate.%04d.exr'));
    expect(plate.setFrameRange).not.toHaveBeenCalled();
  });

  it('NVU-004: a node without the version keeps its pre-session values', () => {
    const t = setup();
    const { plate, matte } = nodesFor(t);
    const warnings: string[] = [];
    const updater = createUpdater(t, [plate, matte], {}, (m) => warnings.push(m));

    updater.applyVersion(3);

    expect(plate.path).toBe(t.resolve('plate_v001/plate.%04d.exr'));
    expect(plate.range).toEqual({ first: 1001, last: 1003 });
    expect(warnings).toEqual(['plate: version 3 not found on disk, node left unchanged']);
  });

  it('NVU-005: setMissing substitutes the version text anyway', () => {
    const t = setup();
    const { plate, matte } = nodesFor(t);
    const updater = createUpdater(t, [plate, matte], { setMissing: true });

    const results = updater.applyVersion(2);

    expect(results[1]).toEqual({ label: 'matte', outcome: 'substituted', path: 'matte/matte_v002.%04d.exr', range: null });
    expect(matte.path).toBe('matte/matte_v002.%04d.exr');
  });

  it('NVU-006: restore writes back every original path and range', () => {
    const t = setup();
    const { plate, matte } = nodesFor(t);
    const updater = createUpdater(t, [plate, matte]);

    updater.applyVersion(2);
    updater.applyVersion(3);
    updater.restore();

    expect(plate.path).toBe(t.resolve('plate_v001/plate.%04d.exr'));
    expect(plate.range).toEqual({ first: 1001, last: 1003 });
    expect(matte.path).toBe('matte/matte_v001.%04d.exr');
    expect(matte.range).toBeNull();
  });

  it('NVU-007: an adapter failure on one node does not stop the others', () => {
    const t = setup();
    const { plate, matte } = nodesFor(t);
    const locked = createMockNode({ name: 'locked', path: 'matte/matte_v001.%04d.exr', failOnSetPath: true });
    const onWarning = vi.fn();
    const updater = createUpdater(t, [locked, matte], {}, onWarning);

    const results = updater.applyVersion(3);

    expect(results[0]).toEqual({
      label: 'locked',
      outcome: 'failed',
      path: null,
      range: null,
      error: 'locked is locked',
    });
    expect(matte.path).toBe('matte/matte_v003.%04d.exr');
    expect(onWarning).toHaveBeenCalledWith('Could not update locked to version 3: locked is locked');
    expect(plate.setPathValue).not.toHaveBeenCalled();
  });

  it('NVU-008: reads paths that carry a trailing frame range', () => {
    const t = setup();
    const original = `${t.resolve('plate_v001/plate.%04d.exr')} 1001-1003`;
    const plate = createMockNode({ name: 'plate', path: original, range: { first: 1001, last: 1003 } });
    const updater = createUpdater(t, [plate]);

    updater.applyVersion(2);
    expect(plate.path).toBe(t.resolve('plate_v002/plate.%04d.exr'));

    updater.restore();
    expect(plate.path).toBe(original);
  });

  it('NVU-009: resolves each node once per session', () => {
    const t = setup();
    const { matte } = nodesFor(t);
    const updater = createUpdater(t, [matte]);
    const [snapshot] = updater.nodes;
    if (!snapshot) throw new Error('expected a snapshot');

    const first = updater.versionsFor(snapshot);
    expect(first.map((e) => e.version)).toEqual([1, 3]);
    expect(updater.versionsFor(snapshot)).toBe(first);
  });
});
