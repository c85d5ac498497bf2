import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { JSONRPCNotification } from "@modelcontextprotocol/sdk/types.js";
import process from "node:process";
import type { LogLevel } from "./utils/logger.js";

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';

const CONSOLE_METHODS: readonly ConsoleMethod[] = ['log', 'info', 'warn', 'error', 'debug'];

const CONSOLE_LEVELS: Record<ConsoleMethod, LogLevel> = {
  log: 'info',
  info: 'info',
  warn: 'warning',
  error: 'error',
  debug: 'debug',
};

/**
 * StdioServerTransport that keeps console output off the JSON-RPC stream.
 * Console calls become MCP log notifications once the client has
 * initialized, and go to stderr until then.
 */
export class FilteredStdioServerTransport extends StdioServerTransport {
  private readonly originalConsole: Record<ConsoleMethod, (...args: unknown[]) => void>;
  private isInitialized: boolean = false;

  constructor() {
    super();

    this.originalConsole = {
      log: console.log,
      info: console.info,
      warn: console.warn,
      error: console.error,
      debug: console.debug,
    };

    this.setupConsoleRedirection();

    process.stderr.write(`[pattern-edit] FilteredStdioServerTransport initialized\n`);
  }

  /**
   * Call after MCP initialization is complete to route logs to the client
   */
  public enableNotifications() {
    this.isInitialized = true;
  }

  public get isNotificationsEnabled(): boolean {
    return this.isInitialized;
  }

  private setupConsoleRedirection() {
    for (const method of CONSOLE_METHODS) {
      const level = CONSOLE_LEVELS[method];
      console[method] = (...args: unknown[]) => {
        const text = args.map(arg => stringify(arg)).join(' ');
        if (this.isInitialized) {
          this.sendLog(level, text);
        } else {
          process.stderr.write(`[${method.toUpperCase()}] ${text}\n`);
        }
      };
    }
  }

  /**
   * Send a log notification to the client
   */
  public sendLog(level: LogLevel, message: string) {
    const notification: JSONRPCNotification = {
      jsonrpc: "2.0",
      method: "notifications/message",
      params: {
        level,
        logger: "pattern-edit",
        data: message,
      },
    };

    this.send(notification).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[${level.toUpperCase()}] ${message} (log notification failed: ${reason})\n`);
    });
  }

  /**
   * Restore the original console methods
   */
  public cleanup() {
    for (const method of CONSOLE_METHODS) {
      console[method] = this.originalConsole[method];
    }
  }
}

function stringify(arg: unknown): string {
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg, null, 2);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}
