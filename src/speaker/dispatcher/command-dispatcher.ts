/**
 * Command Dispatcher
 *
 * Fans commands out from one source queue to every target queue, in order.
 * The button feeds the source; the voice session consumes a target.
 */

import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { AsyncQueue, QueueClosedError } from './async-queue.js';

export interface DispatchTarget<T> {
  name: string;
  queue: AsyncQueue<T>;
}

export class CommandDispatcher<T> {
  private readonly logger = createSubsystemLogger('speaker/dispatcher');
  private loop?: Promise<void>;
  private dispatched = 0;

  constructor(
    private readonly source: AsyncQueue<T>,
    private readonly targets: ReadonlyArray<DispatchTarget<T>>,
  ) {}

  /**
   * Starts the dispatch loop in the background
   */
  start(): void {
    if (this.loop) {
      this.logger.warn('Dispatcher already running');
      return;
    }
    this.logger.info('Dispatcher started', { targets: this.targets.map(target => target.name) });
    this.loop = this.run();
  }

  /**
   * Closes the source queue and waits for the loop to exit
   */
  async stop(): Promise<void> {
    this.source.close();
    if (this.loop) {
      await this.loop;
      this.loop = undefined;
    }
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  get dispatchedCount(): number {
    return this.dispatched;
  }

  private async run(): Promise<void> {
    for (;;) {
      let command: T;
      try {
        command = await this.source.get();
      } catch (error) {
        if (!(error instanceof QueueClosedError)) {
          this.logger.error('Dispatcher failed', describeError(error));
        }
        break;
      }

      this.logger.info('Received command', { command });
      for (const target of this.targets) {
        if (target.queue.isClosed()) {
          this.logger.warn(`Target '${target.name}' is closed, dropping command`, { command });
          continue;
        }
        target.queue.put(command);
        this.logger.debug(`Enqueued command to '${target.name}'`, { command });
      }
      this.dispatched++;
    }

    this.logger.info('Dispatcher stopped', { dispatched: this.dispatched });
  }
}
