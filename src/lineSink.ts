export interface LineSink {
  write(line: string): void;
  error(line: string): void;
}

export class ConsoleSink implements LineSink {
  write(line: string): void {
    console.log(line);
  }

  error(line: string): void {
    console.error(line);
  }
}

// Keeps everything in memory; used by tests and anything that post-processes output
export class BufferedSink implements LineSink {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
