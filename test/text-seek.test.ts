import { test } from 'node:test';
import assert from 'node:assert/strict';
import { GzipTextFile, ResourceError } from '../src/index.js';
import { gzipText, memory } from './helpers.js';

const lines = 'alpha\nbeta\ngamma\n';

for (const chunkSize of [1, 4, 65536]) {
  test(`tell cookies seek back to earlier lines (chunk size ${chunkSize})`, async () => {
    const file = await GzipTextFile.open(memory(gzipText(lines)), 'rt', { chunkSize });
    assert.equal(await file.readline(), 'alpha\n');
    const afterAlpha = file.tell();
    assert.equal(afterAlpha, 6);
    assert.equal(await file.readline(), 'beta\n');
    const afterBeta = file.tell();
    assert.equal(await file.readline(), 'gamma\n');

    assert.equal(await file.seek(afterAlpha), 6);
    assert.equal(file.tell(), 6);
    assert.equal(await file.readline(), 'beta\n');

    assert.equal(await file.seek(afterBeta), 11);
    assert.equal(await file.read(), 'gamma\n');

    assert.equal(await file.seek(0), 0);
    assert.equal(await file.read(), lines);
  });
}

test('seeking to a position no read produced is refused', async () => {
  const file = await GzipTextFile.open(memory(gzipText(lines)));
  await assert.rejects(file.seek(3), (err: unknown) => {
    assert.ok(err instanceof ResourceError);
    assert.equal(err.code, 'GZIP_UNCACHED_SEEK');
    assert.equal(err.message, 'Cannot seek to uncached position 3');
    return true;
  });
});

test('evicted cookies can no longer be reached', async () => {
  const file = await GzipTextFile.open(memory(gzipText('abcdef')), 'rt', { cookieCacheSize: 2 });
  await file.read(1);
  await file.read(1);
  await file.read(1);
  await assert.rejects(file.seek(1), { code: 'GZIP_UNCACHED_SEEK' });
  assert.equal(await file.seek(2), 2);
  assert.equal(await file.read(1), 'c');
});

test('a cookie restores a partially decoded character', async () => {
  const text = 'abé';
  const file = await GzipTextFile.open(memory(gzipText(text, 0)), 'rt', { chunkSize: 2 });
  assert.equal(await file.read(1), 'a');
  assert.equal(await file.read(1), 'b');
  const cookie = file.tell();
  assert.equal(await file.read(), 'é');
  assert.equal(await file.seek(cookie), 2);
  assert.equal(await file.read(), 'é');
});

test('a CRLF read after seeking to a cookie is still one newline', async () => {
  const file = await GzipTextFile.open(memory(gzipText('x\r\ny\n')), 'rt', { chunkSize: 1 });
  assert.equal(await file.read(1), 'x');
  const cookie = file.tell();
  assert.equal(await file.readline(), '\n');
  assert.equal(await file.seek(cookie), 1);
  assert.deepEqual(await file.readlines(), ['\n', 'y\n']);
});

test('end and current seeks', async () => {
  const file = await GzipTextFile.open(memory(gzipText(lines)));
  assert.equal(await file.seek(0, 'end'), lines.length);
  assert.equal(await file.read(), '');
  assert.equal(await file.seek(0, 'current'), lines.length);
  await assert.rejects(file.seek(1, 'current'), {
    code: 'GZIP_UNSUPPORTED_SEEK',
    message: "Can't do nonzero current-relative seeks"
  });
  await assert.rejects(file.seek(-2), { code: 'GZIP_INVALID_OPTION' });
  await file.rewind();
  assert.equal(await file.readline(), 'alpha\n');
});
