// Command multiplexer: both input sources push here, the engine is the
// only consumer. FIFO in arrival order; receive is always bounded so the
// consumer can do periodic work (ticks, redraws) between commands.
import type { Command } from './commands';

type Waiter = (cmd: Command | null) => void;

export class CommandChannel {
  private queue: Command[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  get size(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel is closed and the command was dropped. */
  push(cmd: Command): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(cmd);
      return true;
    }
    this.queue.push(cmd);
    return true;
  }

  /**
   * Next command, or null after `timeoutMs`, on abort, or once closed.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Command | null> {
    const head = this.queue.shift();
    if (head) return Promise.resolve(head);
    if (this.closed || signal?.aborted) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('CommandChannel supports a single consumer'));
    }

    return new Promise<Command | null>((resolve) => {
      const settle: Waiter = (cmd) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === settle) this.waiter = null;
        resolve(cmd);
      };
      const onAbort = () => settle(null);
      const timer = setTimeout(() => settle(null), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = settle;
    });
  }

  /** Take everything queued right now without waiting. */
  drain(): Command[] {
    const out = this.queue;
    this.queue = [];
    return out;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);
  }
}
