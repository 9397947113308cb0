/**
 * Progress line driven by job events.
 *
 * On a terminal the line is redrawn in place with `\r`; otherwise one line is
 * written per finished part so logs stay readable.
 */

import type { EventHook, SegstitchEvent } from "./events.js";

export interface ProgressState {
  total: number;
  done: number;
  failed: number;
  retries: number;
  partsRemuxed: number;
}

export interface ProgressOptions {
  write: (text: string) => void;
  /** Redraw in place instead of printing lines */
  interactive: boolean;
}

export function formatProgress(state: ProgressState): string {
  const percent = state.total === 0 ? 100 : Math.floor((state.done / state.total) * 100);
  const extras: string[] = [];
  if (state.retries > 0) {
    extras.push(`${state.retries} retried`);
  }
  if (state.failed > 0) {
    extras.push(`${state.failed} failed`);
  }
  if (state.partsRemuxed > 0) {
    extras.push(`${state.partsRemuxed} part(s) remuxed`);
  }
  const suffix = extras.length > 0 ? ` (${extras.join(", ")})` : "";
  return `segments ${state.done}/${state.total} ${percent}%${suffix}`;
}

/**
 * Create a reporter; pass `hook` to the job and call `finish` when it ends.
 */
export function createProgressReporter(options: ProgressOptions) {
  const state: ProgressState = { total: 0, done: 0, failed: 0, retries: 0, partsRemuxed: 0 };
  let drawn = false;

  function draw(): void {
    if (options.interactive) {
      options.write(`\r${formatProgress(state)}\x1b[K`);
      drawn = true;
    }
  }

  function print(): void {
    if (!options.interactive) {
      options.write(`${formatProgress(state)}\n`);
    }
  }

  function apply(event: SegstitchEvent): void {
    switch (event.type) {
      case "segments_download_initiated":
        state.total = event.segmentCount;
        state.done = event.alreadyComplete;
        state.failed = 0;
        state.retries = 0;
        state.partsRemuxed = 0;
        draw();
        break;
      case "segment_download_succeeded":
        state.done += 1;
        draw();
        break;
      case "segment_download_retry":
        state.retries += 1;
        draw();
        break;
      case "segment_download_failed":
        state.failed += 1;
        draw();
        break;
      case "part_remuxed":
        state.partsRemuxed += 1;
        draw();
        print();
        break;
      default:
        break;
    }
  }

  const hook: EventHook = apply;

  /**
   * Terminate an in-place line so later output starts on a fresh line.
   */
  function finish(): void {
    if (drawn) {
      options.write("\n");
      drawn = false;
    }
  }

  return {
    hook,
    finish,
    state: (): ProgressState => ({ ...state }),
  };
}

export type ProgressReporter = ReturnType<typeof createProgressReporter>;
