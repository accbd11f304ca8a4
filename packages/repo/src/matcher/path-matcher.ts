import ignore, { type Ignore } from 'ignore';
import { ConfigError, fromSegments } from '@repodump/shared';
import { assertValidPatterns, normalizeGlob, parseIgnoreFile, patternRoot } from './patterns';

/** VCS metadata directories skipped unless an include glob names them. */
export const DEFAULT_EXCLUDES = ['.git', '.hg', '.svn'];

export interface PathMatcherOptions {
  /** When non-empty, a file must match at least one of these. */
  include?: readonly string[];
  exclude?: readonly string[];
  useGitignore?: boolean;
  defaultExcludes?: boolean;
}

/**
 * A single gitignore rule, scoped to the directory whose `.gitignore` declared it.
 */
export interface GitignoreRule {
  readonly pattern: string;
  readonly negated: boolean;
  readonly scope: readonly string[];
  readonly scopeDepth: number;
}

interface CompiledRule extends GitignoreRule {
  /** This rule alone, for reporting which rule decided a verdict. */
  readonly matcher: Ignore;
}

/** Every rule of one `.gitignore`, in file order, in a single matcher. */
interface CompiledScope {
  readonly scope: readonly string[];
  readonly matcher: Ignore;
  readonly rules: CompiledRule[];
}

interface CompiledPattern {
  readonly pattern: string;
  readonly matcher: Ignore;
}

export type ExclusionReason = 'include' | 'exclude' | 'gitignore';

export interface MatchVerdict {
  excluded: boolean;
  reason?: ExclusionReason;
  /** The rule that decided the verdict, if any. */
  pattern?: string;
}

const INCLUDED: Decision = { excluded: false };

/**
 * Decides whether a scan-relative path takes part in the dump.
 *
 * Evaluation order: include globs (files only), then user excludes, then the
 * `.gitignore` scopes from the deepest up. The first scope with a matching
 * rule decides, and inside a scope the last matching rule wins. As in git,
 * re-including a directory does not re-include files another rule ignores.
 * A bare segment such as `node_modules` matches at any depth.
 */
export class PathMatcher {
  private readonly includeMatcher?: Ignore;
  private readonly includePatterns: readonly string[];
  private readonly excludeMatcher: Ignore;
  private readonly excludePatterns: readonly CompiledPattern[];
  /** Deepest scope first. */
  private readonly scopes: CompiledScope[] = [];
  private readonly ruleOrder: CompiledRule[] = [];

  private constructor(
    include: readonly string[],
    exclude: readonly string[],
    readonly gitignoreEnabled: boolean,
  ) {
    this.includePatterns = include;
    if (include.length > 0) {
      this.includeMatcher = compile(include);
    }
    this.excludeMatcher = compile(exclude);
    this.excludePatterns = exclude.map((pattern) => ({ pattern, matcher: compile([pattern]) }));
  }

  /**
   * Validates the user's globs and builds a matcher. A leading `./` is
   * dropped, so `./src` and `src` are the same glob.
   * @throws ConfigError for malformed or conflicting patterns
   */
  static create(options: PathMatcherOptions = {}): PathMatcher {
    const include = (options.include ?? []).map(normalizeGlob);
    const exclude = (options.exclude ?? []).map(normalizeGlob);

    assertValidPatterns(include, 'include');
    assertValidPatterns(exclude, 'exclude');

    const conflicts = include.filter((pattern) => exclude.includes(pattern));
    if (conflicts.length > 0) {
      throw new ConfigError(`Patterns are both included and excluded: ${conflicts.join(', ')}`, {
        details: { conflicts },
      });
    }

    if (options.defaultExcludes ?? true) {
      for (const name of DEFAULT_EXCLUDES) {
        const named = include.some((pattern) => patternRoot(pattern).startsWith(name));
        if (!named) exclude.push(name);
      }
    }

    return new PathMatcher(include, exclude, options.useGitignore ?? true);
  }

  get include(): readonly string[] {
    return this.includePatterns;
  }

  get exclude(): readonly string[] {
    return this.excludePatterns.map(({ pattern }) => pattern);
  }

  /** Gitignore rules in the order they were added. */
  get rules(): readonly GitignoreRule[] {
    return this.ruleOrder.map(({ pattern, negated, scope, scopeDepth }) => ({
      pattern,
      negated,
      scope,
      scopeDepth,
    }));
  }

  /**
   * Appends the rules of one `.gitignore`, scoped to `scope` and below.
   * Does nothing when gitignore handling is disabled.
   * @returns the number of rules added
   */
  addGitignore(scope: readonly string[], text: string): number {
    if (!this.gitignoreEnabled) return 0;

    const lines = parseIgnoreFile(text);
    if (lines.length === 0) return 0;

    const compiled = this.scopeFor(scope);
    for (const { pattern, negated } of lines) {
      const rule: CompiledRule = {
        pattern,
        negated,
        scope: compiled.scope,
        scopeDepth: compiled.scope.length,
        matcher: compile([pattern]),
      };
      compiled.matcher.add(negated ? `!${pattern}` : pattern);
      compiled.rules.push(rule);
      this.ruleOrder.push(rule);
    }
    return lines.length;
  }

  isExcluded(relativePath: readonly string[], isDirectory: boolean): boolean {
    return this.decide(relativePath, isDirectory).excluded;
  }

  /** Like {@link isExcluded}, also naming the pattern that decided. */
  explain(relativePath: readonly string[], isDirectory: boolean): MatchVerdict {
    const decision = this.decide(relativePath, isDirectory);
    const { excluded, reason } = decision;
    if (reason === 'exclude') {
      const candidate = asCandidate(relativePath, isDirectory);
      const hit = this.excludePatterns.find(({ matcher }) => matcher.ignores(candidate));
      return hit ? { excluded, reason, pattern: hit.pattern } : { excluded, reason };
    }
    if (decision.scope) {
      const candidate = asCandidate(relativePath.slice(decision.scope.scope.length), isDirectory);
      const rule = [...decision.scope.rules]
        .reverse()
        .find((r) => r.negated !== excluded && r.matcher.ignores(candidate));
      if (rule) {
        const pattern = rule.negated ? `!${rule.pattern}` : rule.pattern;
        return reason ? { excluded, reason, pattern } : { excluded, pattern };
      }
    }
    return reason ? { excluded, reason } : { excluded };
  }

  private decide(relativePath: readonly string[], isDirectory: boolean): Decision {
    if (relativePath.length === 0) return INCLUDED;

    // Directories are never pruned by includes: `*.ts` must still reach src/.
    if (!isDirectory && this.includeMatcher && !this.includeMatcher.ignores(fromSegments(relativePath))) {
      return { excluded: true, reason: 'include' };
    }

    if (this.excludeMatcher.ignores(asCandidate(relativePath, isDirectory))) {
      return { excluded: true, reason: 'exclude' };
    }

    if (!this.gitignoreEnabled) return INCLUDED;

    // A scope with no opinion on the path defers to the next shallower one.
    for (const scope of this.scopes) {
      if (!inScope(scope.scope, relativePath)) continue;
      const result = scope.matcher.test(asCandidate(relativePath.slice(scope.scope.length), isDirectory));
      if (result.ignored) return { excluded: true, reason: 'gitignore', scope };
      if (result.unignored) return { excluded: false, scope };
    }
    return INCLUDED;
  }

  private scopeFor(scope: readonly string[]): CompiledScope {
    const key = fromSegments(scope);
    const existing = this.scopes.find((s) => fromSegments(s.scope) === key);
    if (existing) return existing;

    const created: CompiledScope = { scope: [...scope], matcher: compile([]), rules: [] };
    const at = this.scopes.findIndex((s) => s.scope.length < scope.length);
    this.scopes.splice(at < 0 ? this.scopes.length : at, 0, created);
    return created;
  }
}

interface Decision {
  excluded: boolean;
  reason?: ExclusionReason;
  scope?: CompiledScope;
}

/** `ignore` rejects dot-only names such as `...` unless relative paths are allowed. */
function compile(patterns: readonly string[]): Ignore {
  return ignore({ allowRelativePaths: true }).add([...patterns]);
}

function asCandidate(segments: readonly string[], isDirectory: boolean): string {
  const rel = fromSegments(segments);
  return isDirectory ? `${rel}/` : rel;
}

function inScope(scope: readonly string[], relativePath: readonly string[]): boolean {
  if (relativePath.length <= scope.length) return false;
  return scope.every((segment, i) => relativePath[i] === segment);
}
