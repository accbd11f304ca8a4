import { z } from 'zod';

export const DEFAULT_MAX_SIZE_BYTES = 1_048_576;
export const DEFAULT_CHARS_PER_TOKEN = 4;

export const BudgetConfigSchema = z.object({
  /** Files larger than this are recorded as SkippedTooLarge. */
  maxSizeBytes: z.number().int().positive().default(DEFAULT_MAX_SIZE_BYTES),
  /** Hard cap on the summed token count of the emitted files. */
  maxTokens: z.number().int().positive().optional(),
});

export const TokenizerConfigSchema = z
  .object({
    strategy: z.enum(['chars', 'words']).default('chars'),
    charsPerToken: z.number().positive().default(DEFAULT_CHARS_PER_TOKEN),
  })
  .default({ strategy: 'chars', charsPerToken: DEFAULT_CHARS_PER_TOKEN });

export const TreeSortKeySchema = z.enum(['name', 'size', 'tokens']);

export const TreeConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxDepth: z.number().int().nonnegative().optional(),
    showTokens: z.boolean().default(true),
    showSize: z.boolean().default(false),
    sortBy: TreeSortKeySchema.default('name'),
    dirsFirst: z.boolean().default(true),
  })
  .default({
    enabled: true,
    showTokens: true,
    showSize: false,
    sortBy: 'name',
    dirsFirst: true,
  });

export const OutputFormatSchema = z.enum(['text', 'json', 'html']);

export const OutputConfigSchema = z
  .object({
    format: OutputFormatSchema.default('text'),
    stdout: z.boolean().default(true),
    outfile: z.string().min(1).optional(),
  })
  .default({ format: 'text', stdout: true });

export const EncodingSchema = z.enum(['utf-8', 'utf-16le', 'latin1']);

export const DumpConfigSchema = z
  .object({
    include: z.array(z.string()).default([]),
    exclude: z.array(z.string()).default([]),
    gitignore: z.boolean().default(true),
    /** Exclude VCS metadata directories (.git, .hg, .svn) unless an include names them. */
    defaultExcludes: z.boolean().default(true),
    binaryStrict: z.boolean().default(true),
    encoding: EncodingSchema.default('utf-8'),
    budget: BudgetConfigSchema.default({}),
    tokenizer: TokenizerConfigSchema,
    tree: TreeConfigSchema,
    output: OutputConfigSchema,
  })
  .superRefine((data, ctx) => {
    const excluded = new Set(data.exclude);
    for (const pattern of data.include) {
      if (excluded.has(pattern)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `pattern "${pattern}" is both included and excluded`,
          path: ['include'],
        });
      }
    }
  });

export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type TokenizerConfig = z.infer<typeof TokenizerConfigSchema>;
export type TreeSortKey = z.infer<typeof TreeSortKeySchema>;
export type TreeConfig = z.infer<typeof TreeConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type Encoding = z.infer<typeof EncodingSchema>;
export type DumpConfig = z.infer<typeof DumpConfigSchema>;
/** What a config file or CLI flags may provide before defaults are applied. */
export type DumpConfigInput = z.input<typeof DumpConfigSchema>;

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends Array<infer U>
    ? Array<U>
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};
