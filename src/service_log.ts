import { EventEmitter } from "node:events";
import type { Role } from "./roles.js";
import { nowIso } from "./pipeline/utils.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  role: Role;
  level: LogLevel;
  message: string;
  at: string;
};

/**
 * Per-service event stream for log lines. Nothing is printed here; the entry
 * point (or a test) subscribes and decides where lines go.
 */
export class ServiceLog {
  private readonly emitter = new EventEmitter();

  constructor(readonly role: Role) {
    // Node treats "error" events specially: if nobody is listening, it throws.
    // Errors stay an optional event stream, never a process crash.
    this.emitter.on("error", () => undefined);
  }

  debug(message: string): void {
    this.emit("debug", message);
  }

  info(message: string): void {
    this.emit("info", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string): void {
    this.emit("error", message);
  }

  subscribe(onEvent: (event: LogEvent) => void): () => void {
    const handler = (event: LogEvent) => onEvent(event);
    this.emitter.on("log", handler);
    this.emitter.on("error", handler);
    return () => {
      this.emitter.off("log", handler);
      this.emitter.off("error", handler);
    };
  }

  private emit(level: LogLevel, message: string): void {
    const event: LogEvent = { role: this.role, level, message, at: nowIso() };
    this.emitter.emit(level === "error" ? "error" : "log", event);
  }
}
