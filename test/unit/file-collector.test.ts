import * as assert from 'node:assert/strict';
import {mkdirSync, symlinkSync} from 'node:fs';
import {join} from 'node:path';
import {describe, it} from 'node:test';
import {collectFiles, excludeMarked, matchesAny} from '../../lib/file-collector';
import {createTempRoot, writeTree} from '../helpers/temp-tree';

describe('collectFiles', () => {
  it('returns exactly the files matching a suffix, relative to the root', () => {
    const root = createTempRoot();
    writeTree(root, {
      'a.o': '',
      'obj/b.o': '',
      'obj/deep/c.o': '',
      'obj/c.obj': '',
      'notes.txt': '',
    });

    const found = collectFiles(root, ['.o']).sort();
    assert.deepStrictEqual(found, ['a.o', 'obj/b.o', 'obj/deep/c.o']);
  });

  it('accepts a file when any matcher applies', () => {
    const root = createTempRoot();
    writeTree(root, {
      'webrtc.dll': '',
      'webrtc.dll.lib': '',
      'webrtc.dll.pdb': '',
      'base.pdb': '',
      'base.lib': '',
    });

    const found = collectFiles(root, [/.*\.dll.*/, '.pdb']).sort();
    assert.deepStrictEqual(found, ['base.pdb', 'webrtc.dll', 'webrtc.dll.lib', 'webrtc.dll.pdb']);
  });

  it('treats literal names as suffixes', () => {
    const root = createTempRoot();
    writeTree(root, {
      'opus/COPYING': '',
      'expat/LICENSE': '',
      'expat/README': '',
      'libvpx/LICENSE_THIRD_PARTY': '',
    });

    const found = collectFiles(root, ['LICENSE', 'COPYING']).sort();
    assert.deepStrictEqual(found, ['expat/LICENSE', 'opus/COPYING']);
  });

  it('reports files under every alias of a directory and stops at loops', () => {
    const root = createTempRoot();
    writeTree(root, {'real/x.h': ''});
    symlinkSync(join(root, 'real'), join(root, 'alias'));
    symlinkSync(root, join(root, 'real', 'loop'));

    const found = collectFiles(root, ['.h']).sort();
    assert.deepStrictEqual(found, ['alias/x.h', 'real/x.h']);
  });

  it('walks sibling links to the same directory', () => {
    const root = createTempRoot();
    writeTree(root, {'shared/include/api.h': ''});
    symlinkSync(join(root, 'shared'), join(root, 'one'));
    symlinkSync(join(root, 'shared'), join(root, 'two'));

    const found = collectFiles(root, ['.h']).sort();
    assert.deepStrictEqual(found, ['one/include/api.h', 'shared/include/api.h', 'two/include/api.h']);
  });

  it('reports broken links that match as files', () => {
    const root = createTempRoot();
    mkdirSync(join(root, 'libxslt'));
    symlinkSync(join(root, 'libxslt', 'COPYING'), join(root, 'libxslt', 'COPYING'));

    assert.deepStrictEqual(collectFiles(root, ['COPYING']), ['libxslt/COPYING']);
  });

  it('returns nothing for a missing root', () => {
    assert.deepStrictEqual(collectFiles(join(createTempRoot(), 'absent'), ['.o']), []);
  });
});

describe('matchesAny', () => {
  it('tests patterns against the filename', () => {
    assert.strictEqual(matchesAny('foo.dll.lib', [/.*\.dll.*/]), true);
    assert.strictEqual(matchesAny('foo.lib', [/.*\.dll.*/]), false);
    assert.strictEqual(matchesAny('api.h.def', ['.h', '.h.def']), true);
  });
});

describe('excludeMarked', () => {
  it('drops paths containing the marker', () => {
    const paths = ['a.o', 'obj/examples/c.o', 'obj/b.o'];
    assert.deepStrictEqual(excludeMarked(paths, 'examples'), ['a.o', 'obj/b.o']);
  });
});
