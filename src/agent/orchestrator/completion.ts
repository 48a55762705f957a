/**
 * Completion latch and completion-marker detection.
 */

export class CompletionLatch {
  private reason: string | null = null;

  get completed(): boolean {
    return this.reason !== null;
  }

  get completedBecause(): string | null {
    return this.reason;
  }

  /**
   * Flip the latch. Returns false when it was already closed.
   */
  complete(reason: string): boolean {
    if (this.reason !== null) return false;
    this.reason = reason;
    return true;
  }
}

/**
 * Phrases that must all appear in an executor's captured output for the
 * turn to count as the task's terminal action.
 */
export type CompletionMarker = readonly string[];

export function detectCompletion(
  output: string,
  markers: readonly CompletionMarker[]
): CompletionMarker | null {
  for (const marker of markers) {
    if (marker.length > 0 && marker.every((phrase) => output.includes(phrase))) {
      return marker;
    }
  }
  return null;
}
