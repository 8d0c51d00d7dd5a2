import type { CompressorConfig } from '../../config/compressor-config';
import { checkPrecondition } from '../errors/precondition.error';
import { CompressionAlgorithm, compressionAlgorithmName } from '../tags/compression-algorithm';
import {
  BROTLI_LEVEL,
  BROTLI_WINDOW_LOG,
  WINDOW_LOG,
  ZSTD_LEVEL,
  inRange,
} from './compression-limits';

/**
 * Value object describing how chunk payloads are compressed.
 *
 * Holds the algorithm, its level and an optional LZ77 window log. Every
 * setter validates its arguments and returns `this`, so options are usually
 * built by chaining. Invalid arguments are programming errors and throw
 * {@link PreconditionError}; use `parseCompressorOptions()` for text that
 * comes from a user.
 *
 * A window log is only ever present together with Brotli or Zstd.
 *
 * @example
 * ```ts
 * const options = new CompressorOptions().setZstd(9).setWindowLog(24);
 *
 * options.algorithm;       // CompressionAlgorithm.Zstd
 * options.zstdWindowLog(); // 24
 * ```
 */
export class CompressorOptions {
  static readonly MIN_BROTLI = BROTLI_LEVEL.min;
  static readonly MAX_BROTLI = BROTLI_LEVEL.max;
  static readonly DEFAULT_BROTLI = BROTLI_LEVEL.default;

  static readonly MIN_ZSTD = ZSTD_LEVEL.min;
  static readonly MAX_ZSTD = ZSTD_LEVEL.max;
  static readonly DEFAULT_ZSTD = ZSTD_LEVEL.default;

  static readonly MIN_WINDOW_LOG = WINDOW_LOG.min;
  static readonly MAX_WINDOW_LOG = WINDOW_LOG.max;

  private selectedAlgorithm: CompressionAlgorithm = CompressionAlgorithm.Brotli;
  private selectedLevel: number = BROTLI_LEVEL.default;
  private selectedWindowLog: number | undefined = undefined;

  /**
   * Build options from a plain configuration object.
   * @throws {PreconditionError} if any field is out of range
   */
  static fromConfig(config: CompressorConfig): CompressorOptions {
    const options = new CompressorOptions();
    switch (config.algorithm) {
      case 'uncompressed':
      case 'snappy':
        checkPrecondition(
          config.level === undefined || config.level === 0,
          'CompressorOptions.fromConfig()',
          `${config.algorithm} has no compression levels`,
        );
        if (config.algorithm === 'snappy') {
          options.setSnappy();
        } else {
          options.setUncompressed();
        }
        break;
      case 'brotli':
        options.setBrotli(config.level);
        break;
      case 'zstd':
        options.setZstd(config.level);
        break;
      default: {
        const unreachable: never = config.algorithm;
        throw new Error(`Unknown compression algorithm: ${String(unreachable)}`);
      }
    }
    return options.setWindowLog(config.windowLog);
  }

  get algorithm(): CompressionAlgorithm {
    return this.selectedAlgorithm;
  }

  get level(): number {
    return this.selectedLevel;
  }

  /**
   * Logarithm of the LZ77 sliding window size, or `undefined` to keep the
   * backend default (Brotli: 22, Zstd: derived from level and chunk size).
   */
  get windowLog(): number | undefined {
    return this.selectedWindowLog;
  }

  /**
   * Turn compression off.
   * @throws {PreconditionError} if a window log is set
   */
  setUncompressed(): this {
    this.checkNoWindowLog('CompressorOptions.setUncompressed()');
    this.selectedAlgorithm = CompressionAlgorithm.None;
    this.selectedLevel = 0;
    return this;
  }

  /**
   * Compress with Brotli. This is the default algorithm.
   * @throws {PreconditionError} if `level` is not an integer in 0..11
   */
  setBrotli(level: number = BROTLI_LEVEL.default): this {
    checkPrecondition(
      inRange(level, BROTLI_LEVEL),
      'CompressorOptions.setBrotli()',
      'compression level out of range',
    );
    this.selectedAlgorithm = CompressionAlgorithm.Brotli;
    this.selectedLevel = level;
    return this;
  }

  /**
   * Compress with Zstd. Level 0 is the same as level 3.
   * @throws {PreconditionError} if `level` is not an integer in -131072..22
   */
  setZstd(level: number = ZSTD_LEVEL.default): this {
    checkPrecondition(
      inRange(level, ZSTD_LEVEL),
      'CompressorOptions.setZstd()',
      'compression level out of range',
    );
    this.selectedAlgorithm = CompressionAlgorithm.Zstd;
    this.selectedLevel = level;
    return this;
  }

  /**
   * Compress with Snappy, which has no levels to tune.
   * @throws {PreconditionError} if a window log is set
   */
  setSnappy(): this {
    this.checkNoWindowLog('CompressorOptions.setSnappy()');
    this.selectedAlgorithm = CompressionAlgorithm.Snappy;
    this.selectedLevel = 0;
    return this;
  }

  /**
   * Set the window log, or clear it with `undefined`.
   * @throws {PreconditionError} if out of 10..31, or if the algorithm is
   *   None or Snappy
   */
  setWindowLog(windowLog: number | undefined): this {
    if (windowLog !== undefined) {
      checkPrecondition(
        inRange(windowLog, WINDOW_LOG),
        'CompressorOptions.setWindowLog()',
        'window log out of range',
      );
      checkPrecondition(
        this.selectedAlgorithm === CompressionAlgorithm.Brotli ||
          this.selectedAlgorithm === CompressionAlgorithm.Zstd,
        'CompressorOptions.setWindowLog()',
        `window log is not supported by ${compressionAlgorithmName(this.selectedAlgorithm)}`,
      );
    }
    this.selectedWindowLog = windowLog;
    return this;
  }

  /**
   * Window log to pass to the Brotli encoder.
   * @throws {PreconditionError} unless the algorithm is Brotli and the window
   *   log fits Brotli's range
   */
  brotliWindowLog(): number {
    checkPrecondition(
      this.selectedAlgorithm === CompressionAlgorithm.Brotli,
      'CompressorOptions.brotliWindowLog()',
      'compression algorithm must be brotli',
    );
    if (this.selectedWindowLog === undefined) {
      return BROTLI_WINDOW_LOG.default;
    }
    checkPrecondition(
      inRange(this.selectedWindowLog, BROTLI_WINDOW_LOG),
      'CompressorOptions.brotliWindowLog()',
      'window log out of range for brotli',
    );
    return this.selectedWindowLog;
  }

  /**
   * Window log to pass to the Zstd encoder. `undefined` tells the encoder to
   * derive one from the level and chunk size.
   * @throws {PreconditionError} unless the algorithm is Zstd
   */
  zstdWindowLog(): number | undefined {
    checkPrecondition(
      this.selectedAlgorithm === CompressionAlgorithm.Zstd,
      'CompressorOptions.zstdWindowLog()',
      'compression algorithm must be zstd',
    );
    // WINDOW_LOG already equals Zstd's own range.
    return this.selectedWindowLog;
  }

  /**
   * Create an independent copy.
   */
  clone(): CompressorOptions {
    const copy = new CompressorOptions();
    copy.selectedAlgorithm = this.selectedAlgorithm;
    copy.selectedLevel = this.selectedLevel;
    copy.selectedWindowLog = this.selectedWindowLog;
    return copy;
  }

  /**
   * Check equality with other options
   */
  equals(other: CompressorOptions): boolean {
    return (
      this.selectedAlgorithm === other.selectedAlgorithm &&
      this.selectedLevel === other.selectedLevel &&
      this.selectedWindowLog === other.selectedWindowLog
    );
  }

  /**
   * Plain-object form, accepted back by {@link CompressorOptions.fromConfig}.
   */
  toConfig(): CompressorConfig {
    const config: CompressorConfig = { algorithm: compressionAlgorithmName(this.selectedAlgorithm) };
    if (this.hasLevel()) {
      config.level = this.selectedLevel;
    }
    if (this.selectedWindowLog !== undefined) {
      config.windowLog = this.selectedWindowLog;
    }
    return config;
  }

  /**
   * Canonical options text, e.g. `zstd:3,window_log:20`.
   */
  toString(): string {
    let text: string = compressionAlgorithmName(this.selectedAlgorithm);
    if (this.hasLevel()) {
      text += `:${this.selectedLevel}`;
    }
    if (this.selectedWindowLog !== undefined) {
      text += `,window_log:${this.selectedWindowLog}`;
    }
    return text;
  }

  private hasLevel(): boolean {
    return (
      this.selectedAlgorithm === CompressionAlgorithm.Brotli ||
      this.selectedAlgorithm === CompressionAlgorithm.Zstd
    );
  }

  private checkNoWindowLog(method: string): void {
    checkPrecondition(
      this.selectedWindowLog === undefined,
      method,
      'window log must be cleared first',
    );
  }
}
