import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  ERROR_SCHEMA_VERSION,
  GzipError,
  GzipFormatError,
  InvalidArgumentError,
  ResourceError,
  UnsupportedOperationError
} from '../src/index.js';
import { wrapCodecError, wrapIoError } from '../src/errors.js';

test('toJSON carries code, message, context and offset', () => {
  const err = new GzipFormatError('GZIP_BAD_CRC', 'CRC check failed', {
    offset: 120,
    context: { stored: '0x00000001', computed: '0x00000002' }
  });
  assert.deepEqual(JSON.parse(JSON.stringify(err)), {
    schemaVersion: ERROR_SCHEMA_VERSION,
    name: 'GzipFormatError',
    code: 'GZIP_BAD_CRC',
    message: 'CRC check failed',
    hint: 'CRC check failed',
    context: { stored: '0x00000001', computed: '0x00000002' },
    offset: 120
  });
});

test('context keys cannot shadow top-level fields', () => {
  const err = new InvalidArgumentError('GZIP_INVALID_OPTION', 'bad', {
    context: { code: 'spoofed', option: 'chunkSize' }
  });
  const json = err.toJSON();
  assert.equal(json.code, 'GZIP_INVALID_OPTION');
  assert.deepEqual(json.context, { option: 'chunkSize' });
  assert.equal('offset' in json, false);
});

test('every error class is a GzipError and an Error', () => {
  const errors = [
    new GzipFormatError('GZIP_TRUNCATED', 'a'),
    new UnsupportedOperationError('GZIP_CLOSED', 'b'),
    new InvalidArgumentError('GZIP_INVALID_MODE', 'c'),
    new ResourceError('GZIP_IO_FAILED', 'd')
  ];
  for (const err of errors) {
    assert.ok(err instanceof GzipError);
    assert.ok(err instanceof Error);
  }
  assert.deepEqual(
    errors.map((err) => err.name),
    ['GzipFormatError', 'UnsupportedOperationError', 'InvalidArgumentError', 'ResourceError']
  );
});

test('I/O failures keep the original error as cause', () => {
  const original = new Error('permission denied');
  const wrapped = wrapIoError(original, 'write', 64);
  assert.ok(wrapped instanceof ResourceError);
  assert.equal(wrapped.message, 'Error during write: permission denied');
  assert.equal(wrapped.offset, 64);
  assert.equal(wrapped.cause, original);
  assert.deepEqual(wrapped.context, { operation: 'write' });
  assert.equal(wrapIoError('plain string', 'read', 0).message, 'Error during read: plain string');
});

test('errors that are already ours pass through unwrapped', () => {
  const format = new GzipFormatError('GZIP_BAD_HEADER', 'Not a gzipped file');
  assert.equal(wrapIoError(format, 'read', 0), format);
  assert.equal(wrapCodecError(format, 'decompression'), format);
  const codec = wrapCodecError(new RangeError('out of memory'), 'compression');
  assert.equal(codec.code, 'GZIP_CODEC_FAILURE');
  assert.equal(codec.message, 'Unexpected error during compression: out of memory');
});
