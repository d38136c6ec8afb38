import { confirm, input } from '@inquirer/prompts';
import { log } from './logging.js';

export interface Prompter {
  ask(message: string, defaultValue: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export class TerminalPrompter implements Prompter {
  async ask(message: string, defaultValue: string) {
    const answer = await input({ message, default: defaultValue });
    return answer.trim();
  }

  async confirm(message: string, defaultValue: boolean) {
    return confirm({ message, default: defaultValue });
  }
}

/** Answers every question with its default. */
export class NonInteractivePrompter implements Prompter {
  async ask(message: string, defaultValue: string) {
    log('info', `[NO PROMPT] Using default value for "${message}": ${defaultValue}`);
    return defaultValue;
  }

  async confirm(message: string, defaultValue: boolean) {
    log('info', `[NO PROMPT] Using default value for "${message}": ${defaultValue ? 'yes' : 'no'}`);
    return defaultValue;
  }
}

export function createPrompter(noPrompt: boolean): Prompter {
  return noPrompt ? new NonInteractivePrompter() : new TerminalPrompter();
}
