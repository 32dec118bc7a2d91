import { execa } from 'execa';
import { Logger } from '../types.js';

const EDITOR_COMMANDS: Record<string, { command: string; label: string }> = {
  cursor: { command: 'cursor', label: 'Cursor' },
  code: { command: 'code', label: 'VS Code' },
  vscode: { command: 'code', label: 'VS Code' },
};

/**
 * Open a worktree in the configured editor. Failing to launch is a warning:
 * the worktree exists either way.
 */
export async function openInEditor(editor: string, worktreePath: string, logger: Logger = console): Promise<boolean> {
  const known = EDITOR_COMMANDS[editor.toLowerCase()];
  if (!known) {
    logger.warn(`⚠️  Unknown editor: ${editor}`);
    return false;
  }

  try {
    await execa(known.command, [worktreePath]);
    logger.log(`💻 Opened in ${known.label}: ${worktreePath}`);
    return true;
  } catch (error) {
    logger.warn(`⚠️  Failed to open ${known.label}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}
