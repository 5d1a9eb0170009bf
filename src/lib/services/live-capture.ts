/**
 * Live Capture
 *
 * Drains a device's real-time punch stream, enriching each event with a
 * display name and status label until the caller aborts or the stream ends.
 */

import type { AttributedEvent, LiveCaptureStream, LiveCaptureSummary } from '../../types/index.js';
import type { NameResolver } from './name-resolver.js';
import { describeError } from './device-communication.js';
import { describeStatus, normalizeAttendance } from './record-normalizer.js';

export interface LiveCaptureEvent extends AttributedEvent {
  /** 1-based position among displayed events */
  sequence: number;
  statusLabel: string;
}

export interface LiveCaptureOptions {
  /** Checked once before every pull */
  signal?: AbortSignal;
  onEvent?: (event: LiveCaptureEvent) => void;
  onTimeout?: (timeouts: number) => void;
}

export async function consumeLiveCapture(
  stream: LiveCaptureStream,
  resolver: NameResolver,
  options: LiveCaptureOptions = {}
): Promise<LiveCaptureSummary> {
  const { signal, onEvent, onTimeout } = options;
  const summary: LiveCaptureSummary = { captured: 0, timeouts: 0, skipped: 0, stoppedBy: 'closed' };

  try {
    for (;;) {
      if (signal?.aborted) {
        summary.stoppedBy = 'cancelled';
        break;
      }

      const item = await stream.next();

      if (item.kind === 'closed') {
        summary.stoppedBy = 'closed';
        break;
      }
      if (item.kind === 'timeout') {
        summary.timeouts++;
        onTimeout?.(summary.timeouts);
        continue;
      }

      const normalized = normalizeAttendance(item.record);
      if (normalized.kind !== 'event') {
        summary.skipped++;
        continue;
      }

      summary.captured++;
      const event = resolver.attribute(normalized.event);
      onEvent?.({
        ...event,
        sequence: summary.captured,
        statusLabel: describeStatus(event.status),
      });
    }
  } finally {
    try {
      await stream.close();
    } catch (error) {
      console.warn(`[LiveCapture] Closing stream failed: ${describeError(error)}`);
    }
  }

  console.log(
    `[LiveCapture] Stopped (${summary.stoppedBy}): ${summary.captured} events, ` +
    `${summary.timeouts} timeouts, ${summary.skipped} skipped`
  );
  return summary;
}
