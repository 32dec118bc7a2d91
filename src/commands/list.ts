import { CommandContext } from '../lib/context.js';
import { formatWorktreeLine } from '../lib/worktree-list.js';
import { unwrap } from '../lib/errors.js';

export async function listCommand(context: CommandContext): Promise<void> {
  const { logger } = context;
  const records = unwrap(await context.registry.snapshot());

  if (records.length === 0) {
    logger.log('No worktrees found');
    return;
  }

  logger.log(`📋 Worktrees (${records.length}):`);
  for (const record of records) {
    logger.log(`   ${formatWorktreeLine(record)}`);
  }
}
