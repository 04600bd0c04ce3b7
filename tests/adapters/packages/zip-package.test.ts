import { promises as fs } from 'fs';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ZipPackageLoader } from '@/adapters/packages/zip-package';
import { makeTempDir, removeDir } from '../../helpers/temp-dir';

const { mockUnzip } = vi.hoisted(() => ({
  mockUnzip: vi.fn(),
}));

vi.mock('unzipit', () => ({
  unzip: mockUnzip,
}));

function entry(name: string, body: Uint8Array, isDirectory = false) {
  return {
    name,
    isDirectory,
    size: body.length,
    arrayBuffer: vi.fn(async () => body.slice().buffer),
  };
}

async function collect(source: AsyncIterable<Uint8Array>): Promise<number[]> {
  const bytes: number[] = [];
  for await (const chunk of source) {
    bytes.push(...chunk);
  }
  return bytes;
}

describe('ZipPackageLoader', () => {
  let dir: string;
  let loader: ZipPackageLoader;

  beforeEach(async () => {
    vi.clearAllMocks();
    mockUnzip.mockReset();
    dir = await makeTempDir();
    loader = new ZipPackageLoader(dir);
    await fs.writeFile(path.join(dir, 'shop.zip'), 'zip bytes');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('loads the archive named after the package', async () => {
    mockUnzip.mockResolvedValue({ zip: {}, entries: {} });

    const result = await loader.load('shop');

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap().id).toBe('shop');
    expect(loader.archivePath('shop')).toBe(path.join(dir, 'shop.zip'));
    expect(mockUnzip).toHaveBeenCalledTimes(1);
  });

  it('lists file entries in central directory order', async () => {
    mockUnzip.mockResolvedValue({
      zip: {},
      entries: {
        'Shop.Zeta.aspx': entry('Shop.Zeta.aspx', new Uint8Array([1])),
        'assets/': entry('assets/', new Uint8Array(0), true),
        'Shop.Alpha.aspx': entry('Shop.Alpha.aspx', new Uint8Array([2])),
      },
    });

    const pkg = (await loader.load('shop'))._unsafeUnwrap();

    expect(pkg.listResources()).toEqual(['Shop.Zeta.aspx', 'Shop.Alpha.aspx']);
  });

  it('leaves entries inside folders out of the listing', async () => {
    mockUnzip.mockResolvedValue({
      zip: {},
      entries: {
        'Shop.Web.Default.aspx': entry('Shop.Web.Default.aspx', new Uint8Array([1])),
        'pages/': entry('pages/', new Uint8Array(0), true),
        'pages/Shop.Web.Other.aspx': entry('pages/Shop.Web.Other.aspx', new Uint8Array([2])),
      },
    });

    const pkg = (await loader.load('shop'))._unsafeUnwrap();

    expect(pkg.listResources()).toEqual(['Shop.Web.Default.aspx']);
  });

  it('streams entry content', async () => {
    const body = new Uint8Array([104, 105, 33]);
    mockUnzip.mockResolvedValue({ zip: {}, entries: { 'Shop.Hi.aspx': entry('Shop.Hi.aspx', body) } });

    const pkg = (await loader.load('shop'))._unsafeUnwrap();
    const source = await pkg.openResource('Shop.Hi.aspx');

    expect(source).not.toBeNull();
    expect(source && (await collect(source))).toEqual([104, 105, 33]);
  });

  it('returns null for unknown resources and directories', async () => {
    mockUnzip.mockResolvedValue({
      zip: {},
      entries: { 'assets/': entry('assets/', new Uint8Array(0), true) },
    });

    const pkg = (await loader.load('shop'))._unsafeUnwrap();

    expect(await pkg.openResource('Shop.Missing.aspx')).toBeNull();
    expect(await pkg.openResource('assets/')).toBeNull();
    expect(await pkg.openResource('toString')).toBeNull();
  });

  it('fails for a missing archive without reading it', async () => {
    const result = await loader.load('absent');

    expect(result._unsafeUnwrapErr()).toMatchObject({
      _tag: 'PackageLoadFailure',
      packageId: 'absent',
      message: `Package archive [${path.join(dir, 'absent.zip')}] not found.`,
    });
    expect(mockUnzip).not.toHaveBeenCalled();
  });

  it('fails for an unreadable archive', async () => {
    mockUnzip.mockRejectedValue(new Error('bad central directory'));

    const result = await loader.load('shop');

    expect(result._unsafeUnwrapErr()).toMatchObject({ _tag: 'PackageLoadFailure', packageId: 'shop' });
  });

  it.each(['', '..', 'nested/shop', 'nested\\shop'])('rejects the package id "%s"', async (packageId) => {
    const result = await loader.load(packageId);

    expect(result._unsafeUnwrapErr()._tag).toBe('PackageLoadFailure');
    expect(mockUnzip).not.toHaveBeenCalled();
  });
});
