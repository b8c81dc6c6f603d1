import type { ProgressEvent } from './types.js';

/**
 * Append-only progress trace for one pipeline run.
 * Percentages are informational; they are clamped into [0, 100] and rounded.
 */
export class ProgressLog {
  private readonly events: ProgressEvent[] = [];

  public record(message: string, percent: number): void {
    const bounded = Math.min(100, Math.max(0, Math.round(percent)));
    this.events.push({ message, percent: Number.isFinite(bounded) ? bounded : 0 });
  }

  public entries(): readonly ProgressEvent[] {
    return this.events.map((event) => ({ ...event }));
  }
}
