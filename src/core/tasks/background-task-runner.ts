import { Logger, LoggerService } from '@nestjs/common';

/**
 * Runs detached work: callers submit and move on without a handle.
 *
 * Webhook fulfilment and every dispense cycle go through here so that a
 * failure is always logged and shutdown can wait for in-flight cycles to
 * finish before pins are released. There is no cancellation.
 */
export class BackgroundTaskRunner {
  private readonly inFlight = new Set<Promise<void>>();
  private submitted = 0;
  private failed = 0;

  constructor(
    private readonly logger: LoggerService = new Logger(BackgroundTaskRunner.name),
  ) {}

  /**
   * Start a task now; returns before it completes
   */
  submit(name: string, task: () => Promise<unknown>): void {
    this.submitted++;

    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          this.failed++;
          this.logger.error(
            `Background task '${name}' failed: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error.stack : undefined,
          );
        },
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });

    this.inFlight.add(tracked);
  }

  /**
   * Number of tasks still running
   */
  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every task - including tasks submitted while draining - has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  getStatistics(): { pending: number; submitted: number; failed: number } {
    return {
      pending: this.inFlight.size,
      submitted: this.submitted,
      failed: this.failed,
    };
  }
}
