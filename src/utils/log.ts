// Tagged diagnostic lines on stderr, off unless DISASM_LOG is set. Per-line
// trace output is capped at `limit` so a large listing does not flood the
// terminal; summary lines always go out while logging is enabled.
export type LogSink = (line: string) => void;

export interface LogSettings {
  log: boolean;
  logLimit: number;
}

export class Logger {
  private count = 0;

  constructor(
    public readonly enabled: boolean,
    private readonly limit: number = 200,
    private readonly sink: LogSink = (line) => console.error(line),
  ) {}

  info(tag: string, msg: string): void {
    if (!this.enabled) return;
    this.sink(`[${tag}] ${msg}`);
  }

  trace(tag: string, msg: string): void {
    if (!this.enabled || this.count >= this.limit) return;
    this.count++;
    this.sink(`[${tag}] ${msg}`);
    if (this.count === this.limit) this.sink(`[${tag}] trace limit of ${this.limit} lines reached`);
  }
}

export const silentLogger = new Logger(false);

export function createLogger(settings: LogSettings, sink?: LogSink): Logger {
  return new Logger(settings.log, settings.logLimit, sink);
}
