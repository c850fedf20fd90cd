/**
 * Interactive command source backed by node:readline.
 *
 * Ctrl+C and Ctrl+D both end input. Closing the interface also puts the
 * terminal back into cooked mode, so close() is the place to restore
 * terminal state before the process exits.
 */

import * as readline from 'node:readline';
import { config } from '../config.js';
import type { CommandSource } from '../session/session.js';

export interface ReadlineSourceOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  historySize?: number;
  /** Force terminal mode on or off (default: detected from output) */
  terminal?: boolean;
}

export class ReadlineSource implements CommandSource {
  private rl: readline.Interface;
  private queued: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private closed = false;
  // readline records entries into this same array
  private readonly history: string[] = [];

  constructor(prompt: string, options: ReadlineSourceOptions = {}) {
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      prompt,
      terminal: options.terminal,
      history: this.history,
      historySize: options.historySize ?? config.repl.historySize,
    });

    this.rl.on('line', (line) => {
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on('SIGINT', () => {
      this.rl.close();
    });

    this.rl.on('close', () => {
      this.closed = true;
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = null;
        resolve(null);
      }
    });
  }

  next(): Promise<string | null> {
    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    this.rl.prompt();
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /**
   * readline has already recorded the line; drop it again when it starts
   * with a space so such lines stay out of history.
   */
  addHistory(line: string): void {
    if (line.startsWith(' ') && this.history[0] === line) {
      this.history.shift();
    }
  }

  getHistory(): readonly string[] {
    return this.history;
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
