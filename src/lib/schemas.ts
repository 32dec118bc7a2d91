import { z } from 'zod';
import { ArborConfig } from '../types.js';

/**
 * Zod schema for the arbor configuration file
 */

export const DEFAULT_COPY_PATHS = ['.env', '.claude', '.cursor', '.agentos', 'CLAUDE.md'];

const CopyPathsSchema = z
  .union([
    z.string().transform((value) => value.split(/\s+/).filter((item) => item.length > 0)),
    z.array(z.string().min(1)),
  ])
  .default(DEFAULT_COPY_PATHS)
  .describe('Files and directories copied from the repository root into new worktrees');

export const ArborConfigSchema = z
  .object({
    editor: z.string().min(1).default('cursor').describe('Editor opened after create (cursor, code, vscode)'),
    copyPaths: CopyPathsSchema,
    defaultStrategy: z
      .enum(['merge', 'rebase', 'squash'])
      .default('merge')
      .describe('Merge strategy used when --strategy is not given'),
    autoConfirm: z.boolean().default(false).describe('Answer yes to merge and cleanup prompts'),
    staleDays: z
      .number()
      .int()
      .min(1)
      .default(30)
      .describe('Days without activity before a worktree counts as stale'),
    remote: z.string().min(1).default('origin').describe('Remote used for pull, push and branch deletion'),
    worktreesDir: z
      .string()
      .optional()
      .describe('Directory for new worktrees (default: <repo>/../<repo-name>-worktrees, supports ~ expansion)'),
    watchInterval: z.number().min(1).default(5).describe('Seconds between status --watch refreshes'),
  })
  .strict() // Reject unknown properties
  .describe('arbor configuration');

export type ArborConfigInput = z.input<typeof ArborConfigSchema>;

function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

/**
 * @throws Error describing every invalid field
 */
export function validateArborConfig(data: unknown): ArborConfig {
  const parsed = ArborConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid config:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
