export type LogLevel = "debug"|"info"|"warn"|"error";

const LEVEL_RANK: Record<LogLevel, number> = {
   debug: 0,
   info: 1,
   warn: 2,
   error: 3,
};

export type LogSink = (level: LogLevel, line: string, ...args: unknown[]) => void;

export interface LoggerOptions {
   level?: LogLevel;
   indentSize?: number;
   now?: () => number; // possible to mock
   sink?: LogSink;
}

export class Logger {
   private indentLevel = 0;
   private readonly indentSize: number;
   private level: LogLevel;
   private readonly now: () => number;
   private readonly sink: LogSink;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? "info";
      this.indentSize = options.indentSize ?? 2;
      this.now = options.now ?? (() => Date.now());
      this.sink = options.sink ?? ((level, line, ...args) => {
                     if (level === "warn") {
                        console.warn(line, ...args);
                     } else if (level === "error") {
                        console.error(line, ...args);
                     } else {
                        console.log(line, ...args);
                     }
                  });
   }

   getLevel(): LogLevel {
      return this.level;
   }

   setLevel(level: LogLevel): void {
      this.level = level;
   }

   isEnabled(level: LogLevel): boolean {
      return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
   }

   private getIndent(): string {
      if (this.indentSize <= 0 || this.indentLevel <= 0) {
         return "";
      }
      return " ".repeat(this.indentLevel * this.indentSize);
   }

   private incIndent(): void {
      this.indentLevel++;
   }

   private decIndent(): void {
      this.indentLevel = Math.max(this.indentLevel - 1, 0);
   }

   private write(level: LogLevel, message: string, ...args: unknown[]): void {
      if (!this.isEnabled(level))
         return;
      const line = `[${this.getTimestamp()}] ${this.getIndent()}${message}`;
      this.sink(level, line, ...args);
   }

   private getTimestamp(): string {
      const d = new Date(this.now());
      const pad = (n: number, width: number = 2) => n.toString().padStart(width, "0");
      const h = pad(d.getHours());
      const m = pad(d.getMinutes());
      const s = pad(d.getSeconds());
      const ms = pad(d.getMilliseconds(), 3);
      return `${h}:${m}:${s}.${ms}`;
   }

   debug(message: string, ...args: unknown[]): void {
      this.write("debug", message, ...args);
   }

   info(message: string, ...args: unknown[]): void {
      this.write("info", message, ...args);
   }

   warn(message: string, ...args: unknown[]): void {
      this.write("warn", message, ...args);
   }

   error(message: string, ...args: unknown[]): void {
      this.write("error", message, ...args);
   }

   // runs fn between "{ name" and "} name (N ms)" debug lines, indenting whatever fn logs.
   //    log.scope("compile schema", () => compile(text));
   scope<T>(name: string, fn: () => T): T {
      this.debug(`{ ${name}`);
      this.incIndent();

      const start = this.now();
      try {
         const r = fn();
         this.decIndent();
         this.debug(`} ${name} (${this.now() - start}ms)`);
         return r;
      } catch (e) {
         this.decIndent();
         this.debug(`} ${name} FAILED (${this.now() - start}ms)`);
         throw e;
      }
   }

   // or if you need separate begin / end routines
   // const ls = log.begin("dump image");
   // try {
   //   // ...
   // } finally {
   //   ls.end();
   // }
   begin(name: string) {
      this.info(`{ ${name}`);
      this.incIndent();
      const start = this.now();
      let ended = false;

      return {
         end: (suffix?: string) => {
            if (ended)
               return;
            ended = true;
            this.decIndent();
            this.info(`} ${name}${suffix ? " " + suffix : ""} (${this.now() - start}ms)`);
         },
      };
   }
}

// global for simplicity; every API that logs also takes a `log` option.
export const gLog = new Logger();
