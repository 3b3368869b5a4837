/**
 * Turns arbitrary stream chunks into complete lines. A trailing
 * partial line is held until more data or `flush()`.
 */
export class LineSplitter {
  private pending = '';

  constructor(private readonly onLine: (line: string) => void) {}

  write(chunk: Buffer | string): void {
    const text = this.pending + chunk.toString();
    const lines = text.split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.onLine(line);
    }
  }

  flush(): void {
    if (this.pending.length > 0) {
      this.onLine(this.pending);
      this.pending = '';
    }
  }
}
