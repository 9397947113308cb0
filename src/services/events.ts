/**
 * Job lifecycle events.
 *
 * Hooks are plain callbacks; the CLI uses them to drive the progress line and
 * tests use them to observe ordering without touching the network layer.
 */

import { createLogger } from "../logger.js";

const log = createLogger("events");

export type SegstitchEvent =
  | { type: "segments_download_initiated"; segmentCount: number; alreadyComplete: number }
  | { type: "segment_download_succeeded"; sequence: number; partId: number; path: string; size: number }
  | { type: "segment_download_retry"; sequence: number; attempt: number; delayMs: number; error: string }
  | { type: "segment_download_failed"; sequence: number; uri: string; error: string }
  | { type: "part_settled"; partId: number; ok: boolean }
  | { type: "segments_download_finished"; successCount: number; failureCount: number }
  | { type: "part_remuxed"; partId: number; path: string; skipped: boolean }
  | { type: "merge_finished"; path: string };

export type EventHook = (event: SegstitchEvent) => void;

/**
 * Deliver an event to every hook. A throwing hook is logged and does not stop
 * delivery to the others.
 */
export function emitEvent(event: SegstitchEvent, hooks: readonly EventHook[]): void {
  for (const hook of hooks) {
    try {
      hook(event);
    } catch (error) {
      log.error("Event hook failed", {
        type: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
