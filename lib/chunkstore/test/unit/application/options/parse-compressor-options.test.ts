import { describe, test, expect } from 'vitest';
import {
  parseCompressorOptions,
  compressorOptionsFromString,
} from '../../../../src/application/options/parse-compressor-options';
import { CompressorOptions } from '../../../../src/domain/value-objects';
import { CompressionAlgorithm } from '../../../../src/domain/tags';
import { InvalidCompressorOptionsError } from '../../../../src/domain/errors';
import { ChunkStoreError } from '../../../../src/errors';

function parseOk(text: string): CompressorOptions {
  const result = parseCompressorOptions(text);
  if (!result.ok) {
    throw new Error(`expected '${text}' to parse: ${result.error.message}`);
  }
  return result.options;
}

function parseError(text: string): InvalidCompressorOptionsError {
  const result = parseCompressorOptions(text);
  if (result.ok) {
    throw new Error(`expected '${text}' to be rejected, got '${result.options.toString()}'`);
  }
  return result.error;
}

describe('parseCompressorOptions', () => {
  describe('algorithms', () => {
    test('should parse an empty string as the defaults', () => {
      expect(parseOk('').equals(new CompressorOptions())).toBe(true);
    });

    test('should treat commas alone as the defaults', () => {
      expect(parseOk(',,,').equals(new CompressorOptions())).toBe(true);
    });

    test('should parse uncompressed', () => {
      const options = parseOk('uncompressed');
      expect(options.algorithm).toBe(CompressionAlgorithm.None);
      expect(options.level).toBe(0);
    });

    test('should parse snappy', () => {
      const options = parseOk('snappy');
      expect(options.algorithm).toBe(CompressionAlgorithm.Snappy);
      expect(options.level).toBe(0);
    });

    test('should parse brotli with and without a level', () => {
      expect(parseOk('brotli').equals(new CompressorOptions().setBrotli(6))).toBe(true);
      expect(parseOk('brotli:6').equals(parseOk('brotli'))).toBe(true);
      expect(parseOk('brotli:0').level).toBe(0);
      expect(parseOk('brotli:11').level).toBe(11);
    });

    test('should parse zstd with and without a level', () => {
      expect(parseOk('zstd').equals(new CompressorOptions().setZstd(3))).toBe(true);
      expect(parseOk('zstd:3').equals(parseOk('zstd'))).toBe(true);
      expect(parseOk('zstd:-131072').level).toBe(-131072);
      expect(parseOk('zstd:22').level).toBe(22);
      expect(parseOk('zstd:0').level).toBe(0);
    });

    test('should accept an explicit plus sign', () => {
      expect(parseOk('zstd:+7').level).toBe(7);
    });

    test('should normalize negative zero', () => {
      expect(Object.is(parseOk('zstd:-0').level, 0)).toBe(true);
    });
  });

  describe('ordering', () => {
    test('later algorithm options should win', () => {
      const options = parseOk('brotli,zstd');
      expect(options.algorithm).toBe(CompressionAlgorithm.Zstd);
      expect(options.level).toBe(3);

      expect(parseOk('zstd:9,brotli:2').equals(new CompressorOptions().setBrotli(2))).toBe(true);
      expect(parseOk('brotli:9,uncompressed').algorithm).toBe(CompressionAlgorithm.None);
    });

    test('later window_log options should win', () => {
      expect(parseOk('window_log:12,window_log:20').windowLog).toBe(20);
      expect(parseOk('window_log:12,window_log:auto').windowLog).toBeUndefined();
    });

    test('window_log should combine with an algorithm in either order', () => {
      const expected = new CompressorOptions().setZstd(5).setWindowLog(24);
      expect(parseOk('zstd:5,window_log:24').equals(expected)).toBe(true);
      expect(parseOk('window_log:24,zstd:5').equals(expected)).toBe(true);
    });

    test('window_log alone should apply to the default algorithm', () => {
      const options = parseOk('window_log:15');
      expect(options.algorithm).toBe(CompressionAlgorithm.Brotli);
      expect(options.brotliWindowLog()).toBe(15);
    });

    test('window_log:auto should leave the window log unset', () => {
      const options = parseOk('zstd:5,window_log:auto');
      expect(options.algorithm).toBe(CompressionAlgorithm.Zstd);
      expect(options.level).toBe(5);
      expect(options.windowLog).toBeUndefined();
    });

    test('should skip empty segments anywhere', () => {
      expect(parseOk(',zstd:4,,window_log:16,').equals(parseOk('zstd:4,window_log:16'))).toBe(true);
    });

    test('a window log may be set before switching away from snappy', () => {
      const options = parseOk('snappy,window_log:20,brotli:3');
      expect(options.algorithm).toBe(CompressionAlgorithm.Brotli);
      expect(options.windowLog).toBe(20);
    });

    test('window_log:auto is accepted with snappy', () => {
      expect(parseOk('snappy,window_log:auto').algorithm).toBe(CompressionAlgorithm.Snappy);
    });
  });

  describe('errors', () => {
    test('should reject unknown keywords', () => {
      const error = parseError('gzip');
      expect(error.token).toBe('gzip');
      expect(error.reason).toBe("unknown option 'gzip'");
      expect(error.message).toBe(
        "[chunkstore] Invalid compressor options at 'gzip': unknown option 'gzip'",
      );
    });

    test('should match keywords case-sensitively', () => {
      expect(parseError('Brotli').reason).toBe("unknown option 'Brotli'");
      expect(parseError('ZSTD:3').token).toBe('ZSTD:3');
    });

    test('should reject keywords with surrounding whitespace', () => {
      expect(parseError('brotli, zstd').token).toBe(' zstd');
    });

    test('should report the first bad segment', () => {
      expect(parseError('zstd:1,lz4,brotli:99').token).toBe('lz4');
    });

    test('should reject brotli levels out of range', () => {
      expect(parseError('brotli:12').reason).toBe('brotli level must be an integer between 0 and 11');
      expect(parseError('brotli:-1').token).toBe('brotli:-1');
    });

    test('should reject zstd levels out of range', () => {
      expect(parseError('zstd:23').reason).toBe(
        'zstd level must be an integer between -131072 and 22',
      );
      expect(parseError('zstd:-131073').token).toBe('zstd:-131073');
    });

    test('should reject garbled numbers', () => {
      for (const text of ['brotli:', 'brotli:5x', 'brotli:x5', 'zstd:1.5', 'zstd:1e1', 'zstd:0x10', 'zstd: 3', 'zstd:3:4']) {
        expect(parseError(text).token).toBe(text);
      }
    });

    test('should reject window logs out of range', () => {
      expect(parseError('window_log:9').reason).toBe(
        'window_log must be "auto" or an integer between 10 and 31',
      );
      expect(parseError('window_log:32').token).toBe('window_log:32');
    });

    test('should reject malformed window logs', () => {
      expect(parseError('window_log').reason).toBe('window_log requires a value');
      expect(parseError('window_log:').token).toBe('window_log:');
      expect(parseError('window_log:AUTO').token).toBe('window_log:AUTO');
      expect(parseError('window_log:default').token).toBe('window_log:default');
    });

    test('should reject values for keywords that take none', () => {
      expect(parseError('snappy:1').reason).toBe('snappy takes no value');
      expect(parseError('uncompressed:').reason).toBe('uncompressed takes no value');
    });

    test('should reject a window log with uncompressed or snappy', () => {
      const error = parseError('window_log:20,snappy');
      expect(error.token).toBe('window_log:20,snappy');
      expect(error.reason).toBe('window_log is not supported by snappy');

      expect(parseError('uncompressed,window_log:20').reason).toBe(
        'window_log is not supported by uncompressed',
      );
    });

    test('should reject a window log above 30 when brotli is the final algorithm', () => {
      const error = parseError('brotli,window_log:31');
      expect(error.token).toBe('brotli,window_log:31');
      expect(error.reason).toBe('brotli window_log must be between 10 and 30');

      expect(parseError('window_log:31').token).toBe('window_log:31');
      expect(parseError('zstd,window_log:31,brotli:2').reason).toBe(
        'brotli window_log must be between 10 and 30',
      );
    });

    test('should keep window log 30 for brotli and 31 for zstd', () => {
      expect(parseOk('brotli:9,window_log:30').brotliWindowLog()).toBe(30);
      expect(parseOk('zstd,window_log:31').zstdWindowLog()).toBe(31);
      expect(parseOk('brotli,window_log:31,zstd:4').zstdWindowLog()).toBe(31);
    });

    test('errors should be recoverable chunkstore errors', () => {
      const error = parseError('gzip');
      expect(error).toBeInstanceOf(InvalidCompressorOptionsError);
      expect(error).toBeInstanceOf(ChunkStoreError);
      expect(error.name).toBe('InvalidCompressorOptionsError');
    });
  });

  test('should not share state between calls', () => {
    const first = parseOk('zstd:11,window_log:19');
    parseOk('snappy');
    const second = parseOk('zstd:11,window_log:19');
    expect(second.equals(first)).toBe(true);
    expect(second).not.toBe(first);
  });
});

describe('compressorOptionsFromString', () => {
  test('should return parsed options', () => {
    expect(compressorOptionsFromString('zstd:2').equals(new CompressorOptions().setZstd(2))).toBe(true);
  });

  test('should throw the parse error', () => {
    expect(() => compressorOptionsFromString('brotli:12')).toThrow(InvalidCompressorOptionsError);
    expect(() => compressorOptionsFromString('brotli:12')).toThrow(
      "[chunkstore] Invalid compressor options at 'brotli:12': brotli level must be an integer between 0 and 11",
    );
  });
});
