import path from 'path';
import {
  NullLogger,
  UsageError,
  toAppError,
  type AppError,
  type DumpConfig,
  type Logger,
} from '@repodump/shared';
import {
  BudgetEnforcer,
  FileCollector,
  NodeFileSource,
  PathMatcher,
  TreeAggregator,
  createEstimator,
  type DirectoryNode,
  type FileRecord,
  type FileSource,
} from '@repodump/repo';
import { summarize, type DumpSummary } from './summary';

export interface DumpOptions {
  /** Defaults to the real filesystem at `rootPath`. */
  source?: FileSource;
  logger?: Logger;
}

export interface DumpResult {
  status: 'ok';
  /** Last segment of the scan root, for headers. */
  rootName: string;
  records: FileRecord[];
  /** Absent when the tree view is disabled. */
  tree?: DirectoryNode;
  summary: DumpSummary;
}

export interface DumpFailure {
  status: 'error';
  error: AppError;
}

export type DumpOutcome = DumpResult | DumpFailure;

/**
 * Runs matcher → collector → budget → tree over one root. Every failure,
 * including invalid patterns, comes back as an error outcome.
 */
export function runDump(rootPath: string, config: DumpConfig, options: DumpOptions = {}): DumpOutcome {
  const logger = options.logger ?? new NullLogger();
  try {
    const matcher = PathMatcher.create({
      include: config.include,
      exclude: config.exclude,
      useGitignore: config.gitignore,
      defaultExcludes: config.defaultExcludes,
    });
    const source = options.source ?? openSource(rootPath);
    const estimator = createEstimator(config.tokenizer);

    logger.debug(`scanning ${source.root} with ${estimator.name} estimator`);
    const collected = new FileCollector(source, {
      maxSizeBytes: config.budget.maxSizeBytes,
      binaryStrict: config.binaryStrict,
      encoding: config.encoding,
      estimator,
      logger,
    }).collect(matcher);

    const enforced = new BudgetEnforcer(estimator, logger).enforce(collected.records, config.budget);
    logger.debug(
      `budget: ${enforced.totalTokens} tokens, ${enforced.truncated.length} truncated, ${enforced.dropped.length} dropped`,
    );

    const tree = config.tree.enabled
      ? new TreeAggregator({
          maxDepth: config.tree.maxDepth,
          sortBy: config.tree.sortBy,
          dirsFirst: config.tree.dirsFirst,
        }).build(enforced.records)
      : undefined;

    const summary = summarize({
      records: enforced.records,
      directoryCount: collected.directoryCount,
      warnings: [...collected.warnings, ...enforced.warnings],
      maxTokens: config.budget.maxTokens,
    });

    const result: DumpResult = {
      status: 'ok',
      rootName: path.basename(source.root) || source.root,
      records: enforced.records,
      summary,
    };
    if (tree) result.tree = tree;
    return result;
  } catch (error) {
    const appError = toAppError(error);
    logger.debug(`dump failed: ${appError.code}: ${appError.message}`);
    return { status: 'error', error: appError };
  }
}

function openSource(rootPath: string): FileSource {
  try {
    return new NodeFileSource(rootPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`Cannot open ${rootPath}: ${message}`, { cause: error });
  }
}
