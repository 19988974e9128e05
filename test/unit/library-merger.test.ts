import * as assert from 'node:assert/strict';
import {existsSync, readFileSync} from 'node:fs';
import {join, resolve} from 'node:path';
import {describe, it} from 'node:test';
import {archiverScript, mergeLibraries, writeResponseFile} from '../../lib/library-merger';
import {CommandFailedError} from '../../lib/errors';
import {addmodTargets, createRunner, failedResult} from '../helpers/fake-runner';
import {createTempRoot} from '../helpers/temp-tree';
import {captureStderr} from '../helpers/console';

const LIBS = ['obj/b.o', 'obj/a.o', 'obj/c.o'];

describe('archiverScript', () => {
  it('creates, adds each member in order, then saves', () => {
    const script = archiverScript(['x.o', 'sub/y.o'], '/out', '/pkg/lib/webrtc_all.a');
    assert.strictEqual(
      script,
      'create /pkg/lib/webrtc_all.a\naddmod /out/x.o\naddmod /out/sub/y.o\nsave\nend\n',
    );
  });
});

describe('mergeLibraries', () => {
  it('drives ar -M through stdin for archiver-script', () => {
    const root = createTempRoot();
    const destination = join(root, 'pkg', 'lib', 'webrtc_all.a');
    const {runner, calls} = createRunner();

    captureStderr(() => mergeLibraries(runner, 'archiver-script', LIBS, '/out', destination));

    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].command, 'ar');
    assert.deepStrictEqual(calls[0].args, ['-M']);
    assert.deepStrictEqual(addmodTargets(calls[0].options.input ?? ''), [
      '/out/obj/b.o',
      '/out/obj/a.o',
      '/out/obj/c.o',
    ]);
    assert.ok(existsSync(join(root, 'pkg', 'lib')), 'destination directory is created first');
  });

  it('passes a response file to libtool for file-list', () => {
    const root = createTempRoot();
    const destination = join(root, 'lib', 'webrtc_all.a');
    const {runner, calls} = createRunner();

    captureStderr(() => mergeLibraries(runner, 'file-list', LIBS, 'out', destination));

    assert.strictEqual(calls[0].command, 'libtool');
    const [staticFlag, outFlag, out, listFlag, rspPath] = calls[0].args;
    assert.deepStrictEqual([staticFlag, outFlag, out, listFlag], ['-static', '-o', destination, '-filelist']);
    assert.ok(rspPath.endsWith('.rsp'));
    assert.strictEqual(
      readFileSync(rspPath, 'utf8'),
      LIBS.map(lib => resolve('out', lib)).join('\n'),
    );
  });

  it('lists every input after /OUT: for direct-argument', () => {
    const root = createTempRoot();
    const destination = join(root, 'lib', 'webrtc_all.lib');
    const {runner, calls} = createRunner();

    captureStderr(() =>
      mergeLibraries(runner, 'direct-argument', ['base.lib', 'obj/rtc.lib'], '/out', destination),
    );

    assert.strictEqual(calls[0].command, 'lib.exe');
    assert.deepStrictEqual(calls[0].args, [`/OUT:${destination}`, '/out/base.lib', '/out/obj/rtc.lib']);
  });

  for (const strategy of ['archiver-script', 'file-list', 'direct-argument'] as const) {
    it(`fails when the archiver exits non-zero (${strategy})`, () => {
      const {runner} = createRunner(() => failedResult(3));
      const destination = join(createTempRoot(), 'webrtc_all');

      captureStderr(() => {
        assert.throws(
          () => mergeLibraries(runner, strategy, LIBS, '/out', destination),
          (error: unknown) => error instanceof CommandFailedError && error.exitCode === 3,
        );
      });
    });
  }
});

describe('writeResponseFile', () => {
  it('writes one absolute path per line into a fresh file', () => {
    const first = writeResponseFile(['a.o'], '/out');
    const second = writeResponseFile(['a.o'], '/out');
    assert.notStrictEqual(first, second);
    assert.strictEqual(readFileSync(first, 'utf8'), '/out/a.o');
  });
});
