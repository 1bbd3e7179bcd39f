import chalk from 'chalk';

export interface Logger {
  info(msg: string): void;
  ok(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  dim(msg: string): void;
  header(msg: string): void;
  table(rows: [string, string][]): void;
}

function formatTable(rows: [string, string][]): string[] {
  if (rows.length === 0) return [];
  const maxKey = Math.max(...rows.map(([k]) => k.length));
  return rows.map(([key, value]) => `  ${key.padEnd(maxKey)}  ${value}`);
}

/**
 * Terminal logger. Status goes to stdout; warnings and errors go to stderr
 * so a failed run can be told apart from its progress output.
 */
export class ConsoleLogger implements Logger {
  info(msg: string): void {
    console.log(`${chalk.blue('[INFO]')} ${msg}`);
  }

  ok(msg: string): void {
    console.log(`${chalk.green('[OK]')} ${msg}`);
  }

  warn(msg: string): void {
    console.error(`${chalk.yellow('[WARN]')} ${msg}`);
  }

  error(msg: string): void {
    console.error(`${chalk.red('[ERROR]')} ${msg}`);
  }

  dim(msg: string): void {
    console.log(chalk.dim(msg));
  }

  header(msg: string): void {
    console.log('');
    console.log(chalk.bold(msg));
    console.log(chalk.dim('─'.repeat(msg.length + 2)));
  }

  table(rows: [string, string][]): void {
    for (const line of formatTable(rows)) {
      console.log(line);
    }
  }
}

/**
 * Collects messages in memory instead of printing them.
 * Read them back with lines(), or drain them with flush().
 */
export class BufferLogger implements Logger {
  private buffer: string[] = [];

  info(msg: string): void {
    this.buffer.push(`[INFO] ${msg}`);
  }

  ok(msg: string): void {
    this.buffer.push(`[OK] ${msg}`);
  }

  warn(msg: string): void {
    this.buffer.push(`[WARN] ${msg}`);
  }

  error(msg: string): void {
    this.buffer.push(`[ERROR] ${msg}`);
  }

  dim(msg: string): void {
    this.buffer.push(msg);
  }

  header(msg: string): void {
    this.buffer.push('');
    this.buffer.push(`## ${msg}`);
    this.buffer.push('─'.repeat(msg.length + 2));
  }

  table(rows: [string, string][]): void {
    this.buffer.push(...formatTable(rows));
  }

  /** Returns everything collected so far and empties the buffer */
  flush(): string {
    const text = this.buffer.join('\n');
    this.buffer = [];
    return text;
  }

  lines(): string[] {
    return [...this.buffer];
  }
}

export const logger: Logger = new ConsoleLogger();
