import { errorMessage } from '../core/errors.js';
import type { Logger } from './logger.js';

/**
 * Single-consumer mailbox. Messages are handled strictly one at a time in post
 * order; `post` resolves once its own message has been handled.
 */
export class SerialChannel<M> {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  constructor(
    private readonly handler: (message: M) => Promise<void>,
    private readonly logger: Logger
  ) {}

  post(message: M): Promise<void> {
    this.depth += 1;
    const run = this.tail.then(async () => {
      try {
        await this.handler(message);
      } finally {
        this.depth -= 1;
      }
    });

    // a failed message must not wedge the queue for the next one
    this.tail = run.catch((error: unknown) => {
      this.logger.error('Channel handler failed', { error: errorMessage(error) });
    });

    return run;
  }

  get pending(): number {
    return this.depth;
  }

  /** Resolves once everything posted so far has been handled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
