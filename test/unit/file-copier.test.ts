import * as assert from 'node:assert/strict';
import {readFileSync, symlinkSync} from 'node:fs';
import {join} from 'node:path';
import {describe, it} from 'node:test';
import {copyFiles} from '../../lib/file-copier';
import {createTempRoot, listTree, writeTree} from '../helpers/temp-tree';
import {captureStderr} from '../helpers/console';

describe('copyFiles', () => {
  it('preserves relative paths by default', () => {
    const src = createTempRoot();
    const dst = createTempRoot();
    writeTree(src, {'api/peer.h': 'peer', 'base/checks.h': 'checks'});

    const copied = copyFiles(src, dst, ['api/peer.h', 'base/checks.h']);

    assert.deepStrictEqual(copied, ['api/peer.h', 'base/checks.h']);
    assert.deepStrictEqual(listTree(dst), ['api/peer.h', 'base/checks.h']);
    assert.strictEqual(readFileSync(join(dst, 'api', 'peer.h'), 'utf8'), 'peer');
  });

  it('flattens to the basename when keepSrcPath is false', () => {
    const src = createTempRoot();
    const dst = join(createTempRoot(), 'lib');
    writeTree(src, {'obj/a/libfoo.so': '', 'libbar.so': ''});

    copyFiles(src, dst, ['obj/a/libfoo.so', 'libbar.so'], false);

    assert.deepStrictEqual(listTree(dst), ['libbar.so', 'libfoo.so']);
  });

  it('skips files it cannot copy and keeps going', () => {
    const src = createTempRoot();
    const dst = createTempRoot();
    writeTree(src, {'a/LICENSE': 'a', 'c/LICENSE': 'c'});
    symlinkSync(join(src, 'b-COPYING'), join(src, 'b-COPYING'));

    const {result: copied, lines} = captureStderr(() =>
      copyFiles(src, dst, ['a/LICENSE', 'b-COPYING', 'missing/PATENTS', 'c/LICENSE']),
    );

    assert.deepStrictEqual(copied, ['a/LICENSE', 'c/LICENSE']);
    assert.deepStrictEqual(listTree(dst), ['a/LICENSE', 'c/LICENSE']);
    assert.deepStrictEqual(lines, [
      `[webrtc-packager] WARN Could not copy "${join(src, 'b-COPYING')}"; skipping...`,
      `[webrtc-packager] WARN Could not copy "${join(src, 'missing/PATENTS')}"; skipping...`,
    ]);
  });
});
