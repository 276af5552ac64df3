import readline from 'node:readline/promises';

/** Yes/no confirmation, injectable so operations stay testable. */
export interface Prompter {
  confirm(question: string, defaultYes: boolean): Promise<boolean>;
}

/**
 * Interpret a typed answer. With a yes default anything but n/no accepts;
 * with a no default only y/yes accepts.
 */
export function parseAnswer(answer: string, defaultYes: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (defaultYes) {
    return normalized !== 'n' && normalized !== 'no';
  }
  return normalized === 'y' || normalized === 'yes';
}

export function promptSuffix(defaultYes: boolean): string {
  return defaultYes ? '[Y/n]' : '(y/N)';
}

export class ReadlinePrompter implements Prompter {
  async confirm(question: string, defaultYes: boolean): Promise<boolean> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      const answer = await rl.question(`${question} ${promptSuffix(defaultYes)} `);
      return parseAnswer(answer, defaultYes);
    } finally {
      rl.close();
    }
  }
}
