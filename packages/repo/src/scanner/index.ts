import {
  AppError,
  EncodingError,
  NullLogger,
  TraversalError,
  compareNames,
  fromSegments,
  toWarning,
  type DumpWarning,
  type Encoding,
  type Logger,
} from '@repodump/shared';
import type { PathMatcher } from '../matcher/path-matcher';
import { CharRatioEstimator, type TokenEstimator } from '../tokens/estimator';
import { includedRecord, skippedRecord } from '../records/status';
import type { FileRecord } from '../records/types';
import type { CollectOptions, CollectResult, FileSource, ResolvedEntry, SourceEntry } from './types';
import { decodeText, detectBinary } from './utils';

export * from './types';
export { NodeFileSource } from './node-source';
export { MemoryFileSource, type MemoryEntries, type MemoryLinks } from './memory-source';
export { detectBinary, decodeText } from './utils';

const GITIGNORE = '.gitignore';

/**
 * Walks a {@link FileSource} depth-first in code-unit order of entry names and
 * produces one {@link FileRecord} per eligible file. Directories the matcher
 * excludes are pruned before they are listed.
 */
export class FileCollector {
  private readonly maxSizeBytes?: number;
  private readonly binaryStrict: boolean;
  private readonly encoding: Encoding;
  private readonly estimator: TokenEstimator;
  private readonly logger: Logger;

  constructor(
    private readonly source: FileSource,
    options: CollectOptions = {},
  ) {
    this.maxSizeBytes = options.maxSizeBytes;
    this.binaryStrict = options.binaryStrict ?? true;
    this.encoding = options.encoding ?? 'utf-8';
    this.estimator = options.estimator ?? new CharRatioEstimator();
    this.logger = (options.logger ?? new NullLogger()).child({ stage: 'collect' });
  }

  collect(matcher: PathMatcher): CollectResult {
    const state: WalkState = { records: [], warnings: [], directoryCount: 0 };

    let root: ResolvedEntry;
    try {
      root = this.source.resolve([]);
    } catch (error) {
      this.warn(state, new TraversalError('', `Cannot open scan root: ${messageOf(error)}`, { cause: error }));
      return state;
    }

    this.walk([], new Set([root.realPath]), matcher, state);
    this.logger.debug(
      `collected ${state.records.length} files in ${state.directoryCount} directories`,
    );
    return state;
  }

  private walk(
    dir: readonly string[],
    ancestors: ReadonlySet<string>,
    matcher: PathMatcher,
    state: WalkState,
  ): void {
    let entries: SourceEntry[];
    try {
      entries = this.source.list(dir).sort((a, b) => compareNames(a.name, b.name));
    } catch (error) {
      const at = fromSegments(dir);
      this.warn(state, new TraversalError(at, `Cannot list ${at || '.'}: ${messageOf(error)}`, { cause: error }));
      return;
    }

    if (matcher.gitignoreEnabled && entries.some((e) => e.name === GITIGNORE && e.kind === 'file')) {
      this.loadGitignore(dir, matcher, state);
    }

    for (const entry of entries) {
      if (entry.kind === 'other') continue;
      const rel = [...dir, entry.name];
      const relPath = fromSegments(rel);

      let resolved: ResolvedEntry;
      try {
        resolved = this.source.resolve(rel);
      } catch (error) {
        if (matcher.isExcluded(rel, entry.kind === 'directory')) continue;
        const reason = messageOf(error);
        this.logger.debug(`unreadable ${relPath}: ${reason}`);
        state.records.push(skippedRecord({ relativePath: rel, sizeBytes: 0 }, 'SkippedUnreadable', reason));
        this.warn(state, new TraversalError(relPath, reason, { cause: error }));
        continue;
      }

      if (resolved.kind === 'other') continue;
      const isDirectory = resolved.kind === 'directory';

      if (matcher.isExcluded(rel, isDirectory)) {
        this.logger.debug(`excluded ${relPath}${isDirectory ? '/' : ''}`);
        continue;
      }

      if (!resolved.insideRoot) {
        const reason = 'symlink target is outside the scan root';
        if (isDirectory) {
          this.warn(state, new TraversalError(relPath, `Not following ${relPath}: ${reason}`));
        } else {
          state.records.push(skippedRecord({ relativePath: rel, sizeBytes: 0 }, 'SkippedExcluded', reason));
        }
        continue;
      }

      if (isDirectory) {
        if (ancestors.has(resolved.realPath)) {
          this.warn(state, new TraversalError(relPath, `Symlink cycle at ${relPath}; not descending`));
          continue;
        }
        state.directoryCount++;
        this.walk(rel, new Set([...ancestors, resolved.realPath]), matcher, state);
      } else {
        state.records.push(this.collectFile(rel, resolved.sizeBytes, state));
      }
    }
  }

  private collectFile(rel: readonly string[], statSize: number, state: WalkState): FileRecord {
    const relPath = fromSegments(rel);

    if (this.maxSizeBytes !== undefined && statSize > this.maxSizeBytes) {
      this.logger.debug(`too large ${relPath} (${statSize} bytes)`);
      return skippedRecord(
        { relativePath: rel, sizeBytes: statSize },
        'SkippedTooLarge',
        `${statSize} bytes exceeds the ${this.maxSizeBytes} byte limit`,
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = this.source.read(rel);
    } catch (error) {
      const reason = messageOf(error);
      this.warn(state, new TraversalError(relPath, reason, { cause: error }));
      return skippedRecord({ relativePath: rel, sizeBytes: statSize }, 'SkippedUnreadable', reason);
    }

    const identity = { relativePath: rel, sizeBytes: bytes.byteLength };
    const binary = detectBinary(relPath, bytes, this.binaryStrict, this.encoding);
    if (binary) {
      this.logger.debug(`binary ${relPath}: ${binary}`);
      return skippedRecord(identity, 'SkippedBinary', binary);
    }

    const { text, lossy } = decodeText(bytes, this.encoding);
    if (lossy) {
      this.warn(state, new EncodingError(relPath, this.encoding));
    }
    return includedRecord(identity, text, this.estimator.estimate(text), lossy);
  }

  private loadGitignore(dir: readonly string[], matcher: PathMatcher, state: WalkState): void {
    const rel = [...dir, GITIGNORE];
    try {
      const { text } = decodeText(this.source.read(rel), 'utf-8');
      const added = matcher.addGitignore(dir, text);
      this.logger.debug(`loaded ${added} rules from ${fromSegments(rel)}`);
    } catch (error) {
      const at = fromSegments(rel);
      this.warn(state, new TraversalError(at, `Cannot read ${at}: ${messageOf(error)}`, { cause: error }));
    }
  }

  private warn(state: WalkState, error: AppError): void {
    state.warnings.push(toWarning(error));
    this.logger.warn(error.message);
  }
}

interface WalkState {
  records: FileRecord[];
  warnings: DumpWarning[];
  directoryCount: number;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
