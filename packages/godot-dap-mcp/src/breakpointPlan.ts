import type { BreakpointPlan } from 'dap-session-client';

/**
 * Breakpoints waiting for the next launch or attach, keyed by resolved file
 * path. The debugger only accepts them during the configuration phase, so the
 * tools collect them here and the handshake sends them all at once.
 */
export class BreakpointPlanRegistry {
  private readonly files = new Map<string, Set<number>>();

  public add(file: string, line: number): void {
    const lines = this.files.get(file) ?? new Set<number>();
    lines.add(line);
    this.files.set(file, lines);
  }

  /** Returns false when the file had nothing planned. */
  public clear(file: string): boolean {
    return this.files.delete(file);
  }

  public linesFor(file: string): number[] {
    return [...(this.files.get(file) ?? [])].sort((a, b) => a - b);
  }

  public toPlans(): BreakpointPlan[] {
    return [...this.files.keys()].map((file) => ({
      path: file,
      lines: this.linesFor(file),
    }));
  }

  get size(): number {
    let count = 0;
    for (const lines of this.files.values()) {
      count += lines.size;
    }
    return count;
  }
}
