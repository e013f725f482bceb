// Collects the lines a run prints after its scenarios.
export class RunReport {
  private readonly lines: string[] = [];

  addSummary(line: string): void {
    this.lines.push(line);
  }

  get summary(): readonly string[] {
    return this.lines;
  }
}
