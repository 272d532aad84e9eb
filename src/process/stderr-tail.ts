/**
 * Keeps the last `maxLines` complete stderr lines of a script, plus the unterminated partial
 * line, so a crash report can show what the script printed last.
 */
export class StderrTail {
  private readonly lines: string[] = [];
  private partial = '';

  constructor(private readonly maxLines: number) {}

  push(chunk: string): readonly string[] {
    const parts = `${this.partial}${chunk}`.split('\n');
    this.partial = parts.pop() ?? '';
    const completed: string[] = [];
    for (const part of parts) {
      const line = part.endsWith('\r') ? part.slice(0, -1) : part;
      completed.push(line);
      this.lines.push(line);
    }
    if (this.lines.length > this.maxLines) {
      const excess = this.lines.length - this.maxLines;
      this.lines.splice(0, excess);
    }
    return completed;
  }

  snapshot(): readonly string[] {
    if (this.partial.length === 0) {
      return [...this.lines];
    }
    const withPartial = [...this.lines, this.partial];
    return withPartial.length > this.maxLines ? withPartial.slice(-this.maxLines) : withPartial;
  }
}
