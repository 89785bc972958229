/**
 * Log Multiplexer
 *
 * Turns a child's byte streams into prefixed, colored, timestamped lines on
 * the shared output sink:
 *
 *   <color>HH:MM:SS <name><padding>|<reset> <line>
 *
 * One sink write per line; the sink is shared by every multiplexer and
 * relies on line-sized writes not interleaving.
 */

import type { Readable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { ErrorCode, UsageError } from '../errors';
import { RESET } from './colors';
import { getSupervisorLogger } from './supervisor-logger';
import type { Clock, ColorToken, OutputSink } from './types';

export interface LogMultiplexerOptions {
  prefix: string;
  color: ColorToken;
  output: OutputSink;
  clock?: Clock;
}

export interface MultiplexResult {
  lines: number;
  /** True when stop() cut the inputs short */
  stopped: boolean;
}

/**
 * `name` padded to `padWidth` plus one space, then the separator
 */
export function formatPrefix(name: string, padWidth: number): string {
  return name + ' '.repeat(Math.max(padWidth - name.length, 0) + 1) + '|';
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * Double every backslash so the renderer never sees an escape sequence
 */
export function escapeLine(line: string): string {
  return line.replace(/\\/g, '\\\\');
}

export function formatLogLine(
  line: string,
  options: { prefix: string; color: ColorToken; now: Date }
): string {
  const reset = options.color.code ? RESET : '';
  return `${options.color.code}${formatTimestamp(options.now)} ${options.prefix}${reset} ${escapeLine(line)}`;
}

export class LogMultiplexer {
  private readonly prefix: string;
  private readonly color: ColorToken;
  private readonly output: OutputSink;
  private readonly clock: Clock;
  private readonly inputs: Set<Readable> = new Set();
  private lines = 0;
  private stopped = false;

  constructor(options: LogMultiplexerOptions) {
    if (!options.prefix) {
      throw new UsageError(ErrorCode.E201_FORMATTER_NOT_CONFIGURED);
    }
    this.prefix = options.prefix;
    this.color = options.color;
    this.output = options.output;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Forward every line of every input until all of them end or stop() is called
   */
  async multiplex(...inputs: Readable[]): Promise<MultiplexResult> {
    await Promise.all(inputs.map((input) => this.pump(input)));
    return { lines: this.lines, stopped: this.stopped };
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    for (const input of this.inputs) {
      input.destroy();
    }
  }

  isStopped(): boolean {
    return this.stopped;
  }

  private emit(line: string): void {
    this.lines++;
    this.output.write(formatLogLine(line, { prefix: this.prefix, color: this.color, now: this.clock() }) + '\n');
  }

  private pump(input: Readable): Promise<void> {
    return new Promise<void>((resolve) => {
      if (this.stopped) {
        input.destroy();
        resolve();
        return;
      }

      this.inputs.add(input);
      const decoder = new StringDecoder('utf8');
      let buffer = '';

      const finish = () => {
        this.inputs.delete(input);
        resolve();
      };

      input.on('data', (chunk: Buffer | string) => {
        if (this.stopped) {
          return;
        }
        buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);

        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          this.emit(buffer.slice(0, newline));
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf('\n');
        }
      });

      input.once('end', () => {
        if (!this.stopped) {
          buffer += decoder.end();
          // Unterminated last line is still a line
          if (buffer.length > 0) {
            this.emit(buffer);
          }
        }
        finish();
      });

      input.once('close', finish);

      input.once('error', (error: Error) => {
        getSupervisorLogger().log('warn', 'ERROR', `Output stream error: ${error.message}`, {
          details: { prefix: this.prefix },
        });
        finish();
      });
    });
  }
}
