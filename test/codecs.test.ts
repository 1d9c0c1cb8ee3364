import { test } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidArgumentError, TextCodingError, lookupCodec } from '../src/index.js';
import { bytes } from './helpers.js';

test('encoding names and aliases resolve to canonical codecs', () => {
  assert.equal(lookupCodec('UTF8').name, 'utf-8');
  assert.equal(lookupCodec('utf_8').name, 'utf-8');
  assert.equal(lookupCodec('UTF-16LE').name, 'utf-16-le');
  assert.equal(lookupCodec('ISO-8859-1').name, 'latin-1');
  assert.equal(lookupCodec(' us-ascii ').name, 'ascii');
});

test('unknown encodings are rejected', () => {
  assert.throws(() => lookupCodec('constructor'), (err: unknown) => {
    assert.ok(err instanceof InvalidArgumentError);
    assert.equal(err.code, 'GZIP_UNKNOWN_ENCODING');
    assert.equal(err.message, 'unknown encoding: constructor');
    return true;
  });
});

test('utf-8 strict decoding names the offending byte', () => {
  const codec = lookupCodec('utf-8');
  assert.throws(() => codec.decode(bytes([0x61, 0xff, 0x62]), 'strict'), (err: unknown) => {
    assert.ok(err instanceof TextCodingError);
    assert.equal(err.code, 'GZIP_TEXT_DECODE');
    assert.equal(err.message, "'utf-8' codec can't decode byte 0xff in position 1: invalid start byte");
    return true;
  });
});

test('utf-8 strict decoding reports invalid continuation bytes', () => {
  const codec = lookupCodec('utf-8');
  assert.throws(() => codec.decode(bytes([0xc3, 0x28]), 'strict'), {
    message: "'utf-8' codec can't decode byte 0xc3 in position 0: invalid continuation byte"
  });
});

test('utf-8 replace and ignore handlers', () => {
  const codec = lookupCodec('utf-8');
  const broken = bytes([0x61, 0xe2, 0x82, 0x62, 0xff]);
  assert.equal(codec.decode(broken, 'replace'), 'a\ufffdb\ufffd');
  assert.equal(codec.decode(broken, 'ignore'), 'ab');
});

test('utf-8 rejects surrogate code points in the input bytes', () => {
  const codec = lookupCodec('utf-8');
  assert.equal(codec.decode(bytes([0xed, 0xa0, 0x80]), 'ignore'), '');
});

test('unknown error handlers only fail when an error occurs', () => {
  const codec = lookupCodec('utf-8');
  assert.equal(codec.decode(bytes([0x61]), 'bogus'), 'a');
  assert.throws(() => codec.decode(bytes([0xff]), 'bogus'), {
    name: 'InvalidArgumentError',
    code: 'GZIP_UNKNOWN_ERROR_HANDLER',
    message: "unknown error handler name 'bogus'"
  });
});

test('utf-8 encoding of lone surrogates', () => {
  const codec = lookupCodec('utf-8');
  assert.deepEqual(codec.encode('a\ud800b', 'replace'), bytes([0x61, 0x3f, 0x62]));
  assert.deepEqual(codec.encode('a\ud800b', 'ignore'), bytes([0x61, 0x62]));
  assert.throws(() => codec.encode('a\ud800b', 'strict'), {
    code: 'GZIP_TEXT_ENCODE',
    message: "'utf-8' codec can't encode character '\\ud800' in position 1: surrogates not allowed"
  });
  assert.deepEqual(codec.encode('\u{1f600}', 'strict'), bytes([0xf0, 0x9f, 0x98, 0x80]));
});

test('utf-8 incomplete tails are measured from the end', () => {
  const codec = lookupCodec('utf-8');
  assert.equal(codec.incompleteTail(bytes([0x61])), 0);
  assert.equal(codec.incompleteTail(bytes([0x61, 0xe2])), 1);
  assert.equal(codec.incompleteTail(bytes([0x61, 0xe2, 0x82])), 2);
  assert.equal(codec.incompleteTail(bytes([0xe2, 0x82, 0xac])), 0);
  assert.equal(codec.incompleteTail(bytes([0xf0, 0x9f, 0x98])), 3);
  assert.equal(codec.incompleteTail(bytes([0xff])), 0);
});

test('utf-8 decoding keeps a leading byte order mark', () => {
  const codec = lookupCodec('utf-8');
  assert.equal(codec.decode(bytes([0xef, 0xbb, 0xbf, 0x61]), 'strict'), '\ufeffa');
});

test('utf-16-le round-trips surrogate pairs and holds back split units', () => {
  const codec = lookupCodec('utf-16-le');
  const encoded = codec.encode('a\u{1f600}', 'strict');
  assert.deepEqual(encoded, bytes([0x61, 0x00, 0x3d, 0xd8, 0x00, 0xde]));
  assert.equal(codec.decode(encoded, 'strict'), 'a\u{1f600}');
  assert.equal(codec.incompleteTail(encoded.subarray(0, 3)), 1);
  assert.equal(codec.incompleteTail(encoded.subarray(0, 4)), 2);
  assert.equal(codec.incompleteTail(encoded.subarray(0, 5)), 3);
});

test('utf-16-le reports lone low surrogates', () => {
  const codec = lookupCodec('utf-16-le');
  assert.equal(codec.decode(bytes([0x00, 0xdc, 0x61, 0x00]), 'replace'), '\ufffda');
  assert.throws(() => codec.decode(bytes([0x00, 0xdc]), 'strict'), {
    message: "'utf-16-le' codec can't decode bytes in position 0-1: illegal encoding"
  });
});

test('latin-1 maps every byte and refuses wider characters', () => {
  const codec = lookupCodec('latin-1');
  assert.equal(codec.decode(bytes([0x63, 0x61, 0x66, 0xe9]), 'strict'), 'café');
  assert.deepEqual(codec.encode('café', 'strict'), bytes([0x63, 0x61, 0x66, 0xe9]));
  assert.deepEqual(codec.encode('€1', 'replace'), bytes([0x3f, 0x31]));
  assert.throws(() => codec.encode('€', 'strict'), {
    message: "'latin-1' codec can't encode character '\\u20ac' in position 0: ordinal not in range(256)"
  });
});

test('ascii decoding rejects high bytes', () => {
  const codec = lookupCodec('ascii');
  assert.equal(codec.decode(bytes([0x61, 0x80, 0x62]), 'replace'), 'a\ufffdb');
  assert.throws(() => codec.decode(bytes([0x61, 0x80]), 'strict'), {
    message: "'ascii' codec can't decode byte 0x80 in position 1: ordinal not in range(128)"
  });
  assert.deepEqual(codec.encode('a\u{1f600}b', 'replace'), bytes([0x61, 0x3f, 0x62]));
});
