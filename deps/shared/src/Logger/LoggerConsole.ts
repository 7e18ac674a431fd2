import kleur from "kleur";

import { serializeError, toJson } from "./serialize";
import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
} from "./types";
import { logLevels } from "./types";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

type SharedOutput = {
  transports: LogTransport[];
  console: boolean;
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly output: SharedOutput = { transports: [], console: true }
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.output
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.output
    );
  }

  attachTransport(transport: LogTransport) {
    this.output.transports.push(transport);
  }

  async close() {
    const transports = this.output.transports.splice(0);
    await Promise.all(transports.map((t) => t.close()));
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (
      context: LogContext,
      strings: readonly string[],
      values: readonly unknown[]
    ) => this.write(level, context, strings, values);

    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): LogTemplate;
    function method(
      first?: LogContext | string,
      message?: string
    ): LogTemplate | void {
      if (typeof first === "string") return write({}, [first], []);
      if (message !== undefined) return write(first ?? {}, [message], []);
      return (strings: TemplateStringsArray, ...values: unknown[]) =>
        write(first ?? {}, strings, values);
    }
    return method;
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private resolveEmoji(level: LogLevel, call: LogContext, event?: string) {
    if (call.emoji) return call.emoji;
    if (event && this.emojiMap[event]) return this.emojiMap[event];
    if ((level === "warn" || level === "error") && this.emojiMap[level])
      return this.emojiMap[level];
    if (typeof this.context.emoji === "string") return this.context.emoji;
    return this.emojiMap[level] ?? "";
  }

  private write(
    level: LogLevel,
    call: LogContext,
    strings: readonly string[],
    values: readonly unknown[]
  ) {
    if (!this.enabled(level)) return;

    // emoji 只用於輸出前綴，不寫進 context
    const { event, emoji: _emoji, error, ...rest } = {
      ...this.context,
      ...call,
    };
    const extra: Record<string, unknown> = { ...rest };
    values.forEach((v, i) => {
      extra[`__${i}`] = v;
    });

    const plain = strings.reduce(
      (acc, s, i) => acc + s + (i < values.length ? String(values[i]) : ""),
      ""
    );
    const colored = strings.reduce(
      (acc, s, i) =>
        acc + s + (i < values.length ? kleur.green(String(values[i])) : ""),
      ""
    );

    const eventName = typeof event === "string" ? event : undefined;
    const err =
      error !== undefined
        ? serializeError(error)
        : level === "error"
          ? serializeError(new Error(plain))
          : undefined;

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event: eventName,
      msg: plain,
      context: extra,
      err,
    };
    for (const transport of this.output.transports) transport.write(record);

    if (!this.output.console) return;
    const label = [...this.path, eventName ?? level].join(":");
    const emoji = this.resolveEmoji(level, call, eventName);
    const json = Object.keys(extra).length > 0 ? ` ${toJson(extra)}` : "";
    const line = `${emoji} ${label}: ${colored}${json}`;
    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(
          error !== undefined && err?.stack ? `${line}\n${err.stack}` : line
        );
        break;
    }
  }
}
