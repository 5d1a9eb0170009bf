/**
 * Adapts a callback-driven real-time feed into a pull-based LiveCaptureStream.
 *
 * Each `next()` waits at most `readTimeoutMs` for an event and yields a
 * `timeout` item otherwise, so a consumer polling for cancellation is never
 * blocked longer than that.
 */

import type { AttendanceEventRaw, LiveCaptureItem, LiveCaptureStream } from '../../types/index.js';

/** Events held between pulls; beyond this the oldest are dropped */
export const DEFAULT_MAX_BUFFERED_EVENTS = 10_000;

interface PendingPull {
  resolve: (item: LiveCaptureItem) => void;
  timer: NodeJS.Timeout;
}

export class PushLiveCaptureStream implements LiveCaptureStream {
  private readonly buffer: AttendanceEventRaw[] = [];
  private pending: PendingPull | null = null;
  private closed = false;
  private droppedCount = 0;

  /**
   * @param readTimeoutMs - Upper bound on how long one `next()` waits
   * @param onClose - Tears down the underlying feed; called once
   * @param maxBuffered - Cap on events waiting for a pull
   */
  constructor(
    private readonly readTimeoutMs: number,
    private readonly onClose?: () => Promise<void>,
    private readonly maxBuffered = DEFAULT_MAX_BUFFERED_EVENTS
  ) {}

  /** Events discarded because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Feed an event from the device callback
   */
  push(record: AttendanceEventRaw): void {
    if (this.closed) return;

    if (this.pending) {
      const { resolve, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      resolve({ kind: 'event', record });
      return;
    }
    if (this.buffer.length >= this.maxBuffered) {
      this.buffer.shift();
      this.droppedCount++;
      if (this.droppedCount === 1) {
        console.warn(`[LiveCapture] Buffer full (${this.maxBuffered} events), dropping the oldest`);
      }
    }
    this.buffer.push(record);
  }

  /**
   * Mark the feed as ended (socket closed, device gone). Buffered events are
   * still delivered before `closed`.
   */
  end(): void {
    if (this.closed) return;
    this.closed = true;
    this.settlePending({ kind: 'closed' });
  }

  next(): Promise<LiveCaptureItem> {
    const record = this.buffer.shift();
    if (record) {
      return Promise.resolve({ kind: 'event', record });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    if (this.pending) {
      return Promise.reject(new Error('LiveCaptureStream.next() called while a pull is pending'));
    }

    return new Promise<LiveCaptureItem>((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve({ kind: 'timeout' });
      }, this.readTimeoutMs);
      this.pending = { resolve, timer };
    });
  }

  async close(): Promise<void> {
    const wasOpen = !this.closed;
    this.closed = true;
    this.buffer.length = 0;
    this.settlePending({ kind: 'closed' });

    if (wasOpen && this.onClose) {
      await this.onClose();
    }
  }

  private settlePending(item: LiveCaptureItem): void {
    if (this.pending) {
      const { resolve, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      resolve(item);
    }
  }
}
