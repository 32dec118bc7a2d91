import Enquirer from 'enquirer';
import { WorktreeError } from './errors.js';
import { Prompts } from '../types.js';

/**
 * Interactive answers from the terminal: prompt-sync for yes/no, enquirer for
 * pick-lists.
 */
export class TerminalPrompts implements Prompts {
  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const promptSync = await import('prompt-sync');
    const prompt = promptSync.default({ sigint: true });
    const answer: string | null = prompt(`${message} ${defaultValue ? '(Y/n)' : '(y/N)'} `);
    if (answer === null || answer.trim() === '') {
      return defaultValue;
    }
    return /^y(es)?$/i.test(answer.trim());
  }

  async ask(message: string): Promise<string> {
    const promptSync = await import('prompt-sync');
    const prompt = promptSync.default({ sigint: true });
    const answer: string | null = prompt(`${message} `);
    return (answer ?? '').trim();
  }

  async select<T extends string>(message: string, choices: Array<{ name: T; message: string }>): Promise<T> {
    const enquirer = new Enquirer<{ choice: string }>();
    try {
      const answer = await enquirer.prompt({ type: 'select', name: 'choice', message, choices });
      const picked = choices.find((choice) => choice.name === answer.choice || choice.message === answer.choice);
      if (!picked) {
        throw new Error(`Unexpected selection: ${answer.choice}`);
      }
      return picked.name;
    } catch (error) {
      // enquirer rejects with an empty string on Ctrl-C
      if (error === '' || (error instanceof Error && error.message.includes('Cancelled'))) {
        throw new WorktreeError('PreconditionFailed', 'Cancelled');
      }
      throw error;
    }
  }
}
