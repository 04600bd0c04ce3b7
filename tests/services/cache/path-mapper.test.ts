import path from 'path';
import { describe, it, expect } from 'vitest';
import { foldsPathCase, mapResourceToFileSystem, validateNamespaceRoot } from '@/services/cache/path-mapper';

const NAMESPACE = 'MyNamespace.MySubnamespace';
const RESOURCE = 'MyNamespace.MySubnamespace.MyFolder1.MyFolder2.MyFile.txt';

describe('mapResourceToFileSystem', () => {
  it('maps nested segments to folders and keeps the extension', () => {
    const result = mapResourceToFileSystem(NAMESPACE, RESOURCE, '/temp');

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBe('/temp/MyFolder1/MyFolder2/MyFile.txt');
  });

  it('is deterministic for identical inputs', () => {
    const first = mapResourceToFileSystem(NAMESPACE, RESOURCE, '/temp');
    const second = mapResourceToFileSystem(NAMESPACE, RESOURCE, '/temp');

    expect(first._unsafeUnwrap()).toBe(second._unsafeUnwrap());
  });

  it('maps a resource at the namespace root to a file in the destination', () => {
    const result = mapResourceToFileSystem('Shop', 'Shop.Default.aspx', '/srv/cache');
    expect(result._unsafeUnwrap()).toBe('/srv/cache/Default.aspx');
  });

  it('treats only the last period as the extension', () => {
    const result = mapResourceToFileSystem('Shop', 'Shop.Pages.Page.en-US.resx', '/srv/cache');
    expect(result._unsafeUnwrap()).toBe('/srv/cache/Pages/Page/en-US.resx');
  });

  it('keeps a remainder without periods as a bare file name', () => {
    const result = mapResourceToFileSystem('Shop', 'Shop.README', '/srv/cache');
    expect(result._unsafeUnwrap()).toBe('/srv/cache/README');
  });

  it('normalizes a relative destination to an absolute path', () => {
    const result = mapResourceToFileSystem('Shop', 'Shop.Admin.Index.aspx', 'cache');
    expect(result._unsafeUnwrap()).toBe(path.resolve('cache', 'Admin', 'Index.aspx'));
  });

  it('uses the working directory when no destination is given', () => {
    expect(mapResourceToFileSystem('Shop', 'Shop.Index.aspx', '')._unsafeUnwrap()).toBe(
      path.join(process.cwd(), 'Index.aspx')
    );
    expect(mapResourceToFileSystem('Shop', 'Shop.Index.aspx')._unsafeUnwrap()).toBe(
      path.join(process.cwd(), 'Index.aspx')
    );
  });

  it('preserves case', () => {
    const result = mapResourceToFileSystem('Shop', 'Shop.ADMIN.Index.ASPX', '/srv/cache');
    expect(result._unsafeUnwrap()).toBe('/srv/cache/ADMIN/Index.ASPX');
  });

  describe('prefix enforcement', () => {
    it('rejects a namespace root found later in the identifier', () => {
      const result = mapResourceToFileSystem('MySubnamespace', RESOURCE, '/temp');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr()).toEqual({
        _tag: 'PrefixMismatch',
        namespaceRoot: 'MySubnamespace',
        resourceId: RESOURCE,
        message: `Resource [${RESOURCE}] does not start with namespace root [MySubnamespace.]`,
      });
    });

    it('requires the period after the namespace root', () => {
      const result = mapResourceToFileSystem('Shop', 'ShopFront.Index.aspx', '/temp');
      expect(result._unsafeUnwrapErr()._tag).toBe('PrefixMismatch');
    });

    it('is case-sensitive', () => {
      const result = mapResourceToFileSystem('shop', 'Shop.Index.aspx', '/temp');
      expect(result._unsafeUnwrapErr()._tag).toBe('PrefixMismatch');
    });
  });

  describe('validation', () => {
    it.each([
      ['null', null],
      ['undefined', undefined],
      ['empty', ''],
      ['leading period', '.MyNamespace'],
      ['trailing period', 'MyNamespace.'],
      ['doubled period', 'MyNamespace..MySubnamespace'],
    ])('rejects a %s namespace root', (_label, namespaceRoot) => {
      const result = mapResourceToFileSystem(namespaceRoot, RESOURCE, '/temp');

      expect(result._unsafeUnwrapErr()).toMatchObject({ _tag: 'InvalidArgument', argument: 'namespaceRoot' });
    });

    it.each([
      ['null', null],
      ['undefined', undefined],
      ['empty', ''],
      ['leading period', '.MyNamespace.MySubnamespace.File.txt'],
      ['trailing period', 'MyNamespace.MySubnamespace.File.'],
      ['doubled period', 'MyNamespace.MySubnamespace..File.txt'],
      ['forward slash', 'MyNamespace.MySubnamespace./etc/passwd.aspx'],
      ['backslash', 'MyNamespace.MySubnamespace.a\\b.aspx'],
    ])('rejects a %s resource identifier', (_label, resourceId) => {
      const result = mapResourceToFileSystem(NAMESPACE, resourceId, '/temp');

      expect(result._unsafeUnwrapErr()).toMatchObject({ _tag: 'InvalidArgument', argument: 'resourceId' });
    });

    it('reports the namespace root before the resource identifier', () => {
      const result = mapResourceToFileSystem('', '', '/temp');
      expect(result._unsafeUnwrapErr()).toMatchObject({ argument: 'namespaceRoot' });
    });

    it('checks shape before the prefix', () => {
      const result = mapResourceToFileSystem('Other', 'MyNamespace..File.txt', '/temp');
      expect(result._unsafeUnwrapErr()._tag).toBe('InvalidArgument');
    });
  });
});

describe('validateNamespaceRoot', () => {
  it('accepts a dotted namespace', () => {
    expect(validateNamespaceRoot('Shop.Admin')._unsafeUnwrap()).toBe('Shop.Admin');
  });

  it('describes the violation', () => {
    expect(validateNamespaceRoot('Shop.')._unsafeUnwrapErr().message).toBe(
      'Namespace root [Shop.] may not start or end with a period.'
    );
  });
});

describe('foldsPathCase', () => {
  it.each([
    ['win32', true],
    ['darwin', true],
    ['linux', false],
    ['freebsd', false],
  ] as const)('is %s -> %s', (platform, expected) => {
    expect(foldsPathCase(platform)).toBe(expected);
  });
});
