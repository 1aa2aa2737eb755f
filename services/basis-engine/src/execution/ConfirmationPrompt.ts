import * as readline from 'readline';

/**
 * Asks the operator to approve a trade before it is sent
 */
export interface ConfirmationPrompt {
  confirm(summary: string): Promise<boolean>;
}

/**
 * Terminal prompt; accepts `yes` or `y`. Concurrent calls are queued so each
 * trade gets its own answer; share one instance per input stream.
 */
export class ReadlinePrompt implements ConfirmationPrompt {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  confirm(summary: string): Promise<boolean> {
    const answer = this.queue.then(() => this.ask(summary));
    // errors reach the caller through `answer`; the queue moves on
    this.queue = answer.catch(() => undefined);
    return answer;
  }

  private async ask(summary: string): Promise<boolean> {
    const rule = '='.repeat(60);
    this.output.write(`\n${rule}\nTRADE EXECUTION CONFIRMATION\n${rule}\n${summary}\n${rule}\n`);

    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      const answer = await new Promise<string>((resolve) => {
        rl.question('Execute? (yes/no): ', resolve);
      });
      const normalized = answer.trim().toLowerCase();
      return normalized === 'yes' || normalized === 'y';
    } finally {
      rl.close();
    }
  }
}

/**
 * Fixed answer, for unattended runs and tests
 */
export class StaticPrompt implements ConfirmationPrompt {
  readonly summaries: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(summary: string): Promise<boolean> {
    // eslint-disable-next-line functional/immutable-data
    this.summaries.push(summary);
    return this.answer;
  }
}
