import type { DecisionLogEntry } from '../types';

/** Append-only record of the paths a user actually chose. */
export class DecisionTracker {
  private readonly entries: DecisionLogEntry[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  log(decision: string, chosenPath: string, reasoning: string): DecisionLogEntry {
    const entry: DecisionLogEntry = {
      timestamp: this.clock().toISOString(),
      decision,
      chosenPath,
      reasoning
    };
    this.entries.push(entry);
    return { ...entry };
  }

  history(): DecisionLogEntry[] {
    return this.entries.map(e => ({ ...e }));
  }
}
