/**
 * Interactive prompt
 */

import inquirer from 'inquirer';

export interface Prompt {
  /** Ask a free-text question and return the raw answer */
  ask(question: string): Promise<string>;
}

export class InquirerPrompt implements Prompt {
  async ask(question: string): Promise<string> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'input', name: 'answer', message: question },
    ]);
    return answer;
  }
}
