import readline from 'readline/promises';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createPrompter(): Prompter {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: async (question) => (await rl.question(question)).trim(),
    close: () => rl.close()
  };
}

/**
 * Yes/no question; an empty answer takes the default, anything else is asked again
 */
export async function confirm(prompter: Prompter, message: string, defaultValue = true): Promise<boolean> {
  const choices = defaultValue ? '[Y/n]' : '[y/N]';

  for (;;) {
    const answer = (await prompter.ask(`\n${message} ${choices}: `)).toLowerCase();
    if (answer === '') {
      return defaultValue;
    }
    if (answer === 'y' || answer === 'yes') {
      return true;
    }
    if (answer === 'n' || answer === 'no') {
      return false;
    }
    process.stdout.write("Please enter 'y' or 'n'\n");
  }
}
