import { test } from 'node:test';
import assert from 'node:assert/strict';
import { deflateRawSync } from 'node:zlib';
import { GzipFormatError, MemberDecoder, type GzipWarning } from '../src/index.js';
import { crc32 } from '../src/crc32.js';
import { writeUint32LE } from '../src/binary.js';
import { bytes, concat, decoder, encoder, gzipText } from './helpers.js';

function decodeAll(data: Uint8Array, step = data.length, onWarning?: (warning: GzipWarning) => void): string {
  const member = new MemberDecoder({ onWarning });
  const parts: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += step) {
    parts.push(member.push(data.subarray(offset, offset + step)));
  }
  member.finish();
  return decoder.decode(concat(...parts));
}

function uint16(value: number): Uint8Array {
  return bytes([value & 0xff, (value >>> 8) & 0xff]);
}

type HandmadeHeader = {
  extra?: Uint8Array;
  name?: string;
  comment?: string;
  headerCrc?: 'valid' | 'invalid';
  mtime?: number;
};

/** A member with optional header fields, encoded field by field. */
function handmadeMember(text: string, header: HandmadeHeader): Uint8Array {
  const payload = encoder.encode(text);
  let flags = 0;
  const fields: Uint8Array[] = [];
  if (header.extra) {
    flags |= 0x04;
    fields.push(uint16(header.extra.length), header.extra);
  }
  if (header.name !== undefined) {
    flags |= 0x08;
    fields.push(encoder.encode(header.name), bytes([0]));
  }
  if (header.comment !== undefined) {
    flags |= 0x10;
    fields.push(encoder.encode(header.comment), bytes([0]));
  }
  if (header.headerCrc) flags |= 0x02;
  const fixed = bytes([0x1f, 0x8b, 0x08, flags, 0, 0, 0, 0, 0x00, 0xff]);
  writeUint32LE(fixed, 4, header.mtime ?? 0);
  let head = concat(fixed, ...fields);
  if (header.headerCrc) {
    const value = crc32(head) & 0xffff;
    head = concat(head, uint16(header.headerCrc === 'valid' ? value : value ^ 0xffff));
  }
  const trailer = new Uint8Array(8);
  writeUint32LE(trailer, 0, crc32(payload));
  writeUint32LE(trailer, 4, payload.length);
  return concat(head, bytes(deflateRawSync(payload)), trailer);
}

test('concatenated members decode as one stream', () => {
  const data = concat(gzipText('A'), gzipText('B'));
  const member = new MemberDecoder();
  const out = member.push(data);
  member.finish();
  assert.equal(decoder.decode(out), 'AB');
  assert.equal(member.members, 2);
  assert.equal(member.phase, 'boundary');
});

test('members decode identically when fed one byte at a time', () => {
  const data = concat(gzipText('hello '), gzipText(''), gzipText('world'));
  assert.equal(decodeAll(data, 1), 'hello world');
});

test('zero padding between and after members is skipped with one warning', () => {
  const warnings: GzipWarning[] = [];
  const data = concat(gzipText('A'), new Uint8Array(5), gzipText('B'), new Uint8Array(3));
  assert.equal(decodeAll(data, data.length, (warning) => warnings.push(warning)), 'AB');
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.code, 'GZIP_TRAILING_PADDING');
  assert.equal(warnings[0]?.message, 'Skipped zero padding after a gzip member');
});

test('empty input is an empty stream', () => {
  const member = new MemberDecoder();
  member.finish();
  assert.equal(member.members, 0);
  assert.equal(member.header, null);
});

test('a corrupted CRC is rejected', () => {
  const data = gzipText('checksum me');
  data[data.length - 8] = data[data.length - 8]! ^ 0xff;
  assert.throws(() => decodeAll(data), (err: unknown) => {
    assert.ok(err instanceof GzipFormatError);
    assert.equal(err.code, 'GZIP_BAD_CRC');
    assert.equal(err.message, 'CRC check failed');
    return true;
  });
});

test('a corrupted size is rejected', () => {
  const data = gzipText('sized');
  data[data.length - 4] = 99;
  assert.throws(() => decodeAll(data), (err: unknown) => {
    assert.ok(err instanceof GzipFormatError);
    assert.equal(err.code, 'GZIP_BAD_SIZE');
    assert.equal(err.message, 'Incorrect length of data produced');
    assert.deepEqual(err.context, { stored: '99', computed: '5' });
    return true;
  });
});

test('truncation is reported at finish', () => {
  const data = gzipText('cut short');
  const member = new MemberDecoder();
  member.push(data.subarray(0, data.length - 3));
  assert.equal(member.phase, 'trailer');
  assert.throws(() => member.finish(), {
    name: 'GzipFormatError',
    code: 'GZIP_TRUNCATED',
    message: 'Compressed file ended before the end-of-stream marker was reached'
  });
});

test('a partial header is truncation too', () => {
  const member = new MemberDecoder();
  member.push(bytes([0x1f, 0x8b, 0x08]));
  assert.equal(member.phase, 'header');
  assert.throws(() => member.finish(), { code: 'GZIP_TRUNCATED' });
});

test('non-gzip input is rejected', () => {
  assert.throws(() => decodeAll(encoder.encode('plain text')), {
    code: 'GZIP_BAD_HEADER',
    message: 'Not a gzipped file',
    offset: 0
  });
});

test('garbage after a member is rejected at its offset', () => {
  const first = gzipText('A');
  assert.throws(() => decodeAll(concat(first, bytes([0x42, 0x42]))), {
    code: 'GZIP_BAD_HEADER',
    offset: first.length
  });
});

test('unknown compression methods are rejected', () => {
  assert.throws(() => decodeAll(bytes([0x1f, 0x8b, 0x07, 0, 0, 0, 0, 0, 0, 0])), {
    code: 'GZIP_BAD_HEADER',
    message: 'Unknown compression method 7'
  });
});

test('reserved header flags are rejected', () => {
  assert.throws(() => decodeAll(bytes([0x1f, 0x8b, 0x08, 0x20, 0, 0, 0, 0, 0, 0])), {
    code: 'GZIP_BAD_HEADER',
    message: 'Reserved gzip header flags are set'
  });
});

test('optional header fields are parsed, even split byte by byte', () => {
  const data = handmadeMember('payload', {
    extra: bytes([0x41, 0x42, 0x02, 0x00, 0x01, 0x02]),
    name: 'notes.txt',
    comment: 'a comment',
    headerCrc: 'valid',
    mtime: 1_700_000_000
  });
  const member = new MemberDecoder();
  const parts: Uint8Array[] = [];
  for (let i = 0; i < data.length; i += 1) parts.push(member.push(data.subarray(i, i + 1)));
  member.finish();
  assert.equal(decoder.decode(concat(...parts)), 'payload');
  const header = member.header;
  assert.ok(header);
  assert.equal(header.filename, 'notes.txt');
  assert.equal(header.comment, 'a comment');
  assert.deepEqual(header.extra, bytes([0x41, 0x42, 0x02, 0x00, 0x01, 0x02]));
  assert.equal(header.mtime, 1_700_000_000);
  assert.equal(header.os, 0xff);
  assert.equal(header.flags, 0x1e);
});

test('a header CRC mismatch is rejected', () => {
  const data = handmadeMember('payload', { name: 'x', headerCrc: 'invalid' });
  assert.throws(() => decodeAll(data), {
    code: 'GZIP_BAD_HEADER',
    message: 'Header CRC check failed'
  });
});

test('the first member header is kept across later members', () => {
  const data = concat(handmadeMember('one', { name: 'first' }), handmadeMember('two', { name: 'second' }));
  const member = new MemberDecoder();
  member.push(data);
  member.finish();
  assert.equal(member.header?.filename, 'first');
  assert.equal(member.members, 2);
});
