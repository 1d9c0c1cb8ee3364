import { test } from 'node:test';
import assert from 'node:assert/strict';
import { gunzipSync } from 'node:zlib';
import { MemberDecoder, MemberEncoder, ResourceError } from '../src/index.js';
import { bytes, concat, decoder, encoder, noise } from './helpers.js';

test('a finished member is readable by zlib', () => {
  const member = new MemberEncoder({ level: 6, mtime: 0 });
  const out = concat(member.encode(encoder.encode('hello ')), member.encode(encoder.encode('world')), member.finish());
  assert.equal(decoder.decode(gunzipSync(out)), 'hello world');
  assert.equal(member.finished, true);
  assert.deepEqual(out.subarray(out.length - 4), bytes([11, 0, 0, 0]));
});

for (const level of [-1, 0, 1, 9] as const) {
  test(`level ${level} round-trips`, () => {
    const data = noise(50_000, level + 2);
    const member = new MemberEncoder({ level, mtime: 0 });
    const out = concat(member.encode(data), member.finish());
    assert.deepEqual(bytes(gunzipSync(out)), data);
  });
}

test('the header records mtime, filename and level', () => {
  const member = new MemberEncoder({ level: 9, mtime: 0x01020304, filename: 'data.bin' });
  const out = member.finish();
  assert.deepEqual(out.subarray(0, 10), bytes([0x1f, 0x8b, 0x08, 0x08, 0x04, 0x03, 0x02, 0x01, 0x02, 0xff]));
  assert.equal(decoder.decode(out.subarray(10, 18)), 'data.bin');
  assert.equal(out[18], 0);
  assert.equal(gunzipSync(out).length, 0);
});

test('level 1 sets the fastest extra flag', () => {
  const out = new MemberEncoder({ level: 1, mtime: 0 }).finish();
  assert.equal(out[8], 4);
});

test('filenames latin-1 cannot hold are left out', () => {
  const out = new MemberEncoder({ level: 6, mtime: 0, filename: 'файл.txt' }).finish();
  assert.equal(out[3], 0);
});

test('a null mtime is taken from the clock when the header is written', () => {
  const member = new MemberEncoder({ level: 6, mtime: null });
  assert.equal(member.mtime, null);
  const before = Math.floor(Date.now() / 1000);
  member.encode(encoder.encode('x'));
  const after = Math.floor(Date.now() / 1000);
  const mtime = member.mtime;
  assert.ok(mtime !== null && mtime >= before && mtime <= after);
});

test('flush ends on a sync point the decoder can consume', () => {
  const member = new MemberEncoder({ level: 6, mtime: 0 });
  const partial = concat(member.encode(encoder.encode('hello')), member.flush());
  assert.deepEqual(partial.subarray(partial.length - 4), bytes([0x00, 0x00, 0xff, 0xff]));
  const reader = new MemberDecoder();
  assert.equal(decoder.decode(reader.push(partial)), 'hello');
  assert.equal(reader.phase, 'body');
});

test('nothing can be encoded after finish', () => {
  const member = new MemberEncoder({ level: 6, mtime: 0 });
  member.finish();
  assert.throws(
    () => member.encode(encoder.encode('late')),
    (err: unknown) => err instanceof ResourceError && err.code === 'GZIP_CODEC_FAILURE'
  );
});
