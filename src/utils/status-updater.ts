import { BundleStatus, ProgressMessage } from '../apis/v1/bundle.js';

export type StatusWriter = (status: BundleStatus) => Promise<void>;

/**
 * Accumulates the progress messages of one operation and persists them into
 * the resource status, always as the whole sequence received so far.
 *
 * With a flush interval of 0 every `append` awaits its own write. A positive
 * interval coalesces messages arriving within the window into a single write
 * of the latest snapshot. Writes never overlap, and `close` persists whatever
 * is still pending, including after the operation itself failed.
 */
export class StatusUpdater {
  private readonly messages: ProgressMessage[] = [];
  private timer?: NodeJS.Timeout;
  private inflight?: Promise<void>;
  private dirty = false;
  private closed = false;
  private failed = false;
  private failure: unknown;

  constructor(
    private readonly base: BundleStatus,
    private readonly write: StatusWriter,
    private readonly flushInterval = 0,
  ) {}

  get count(): number {
    return this.messages.length;
  }

  snapshot(): BundleStatus {
    return { ...this.base, messages: [...this.messages] };
  }

  async append(message: ProgressMessage): Promise<void> {
    if (this.closed) {
      throw new Error('Cannot append to a closed status updater');
    }
    this.throwIfFailed();
    this.messages.push(message);

    if (this.flushInterval <= 0) {
      await this.write(this.snapshot());
      return;
    }
    this.dirty = true;
    this.schedule();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.cancelTimer();
    while (this.inflight) {
      await this.inflight;
    }
    this.throwIfFailed();
    if (this.dirty) {
      this.dirty = false;
      await this.write(this.snapshot());
    }
  }

  private schedule(): void {
    if (this.timer || this.inflight || this.closed) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inflight = this.flush().finally(() => {
        this.inflight = undefined;
        if (this.dirty && !this.failed) {
          this.schedule();
        }
      });
    }, this.flushInterval);
  }

  private async flush(): Promise<void> {
    this.dirty = false;
    try {
      await this.write(this.snapshot());
    } catch (error) {
      this.failed = true;
      this.failure = error;
    }
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private throwIfFailed(): void {
    if (this.failed) {
      throw this.failure;
    }
  }
}
