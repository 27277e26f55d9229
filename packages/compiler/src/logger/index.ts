/**
 * Compile Logger - JSONL events for one compiler run
 *
 * Outputs:
 * - stderr, one JSON object per line (printToConsole)
 * - <logDir>/compile-{timestamp}.jsonl (writeToFile)
 */

import { mkdirSync, appendFileSync, existsSync } from 'fs';
import { join } from 'path';
import type {
  LogEvent,
  CompileStartEvent,
  CompileCompleteEvent,
  ModuleParsedEvent,
  ValueResolvedEvent,
  IconsProbedEvent,
  FileWrittenEvent,
} from './types';

export type { LogEvent } from './types';

export interface CompileLoggerOptions {
  logDir?: string;           // Base directory for logs (default: .stylec-logs)
  printToConsole?: boolean;  // Print events to stderr (default: true)
  writeToFile?: boolean;     // Write events to file (default: true)
}

export class CompileLogger {
  private logDir: string;
  private logPath: string;
  private printToConsole: boolean;
  private writeToFile: boolean;

  private seq = 0;
  private events: LogEvent[] = [];
  private startTime = 0;

  constructor(options: CompileLoggerOptions = {}) {
    this.logDir = options.logDir ?? '.stylec-logs';
    this.printToConsole = options.printToConsole ?? true;
    this.writeToFile = options.writeToFile ?? true;

    const runTimestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    this.logPath = join(this.logDir, `compile-${runTimestamp}.jsonl`);
  }

  /** A logger that only keeps events in memory */
  static silent(): CompileLogger {
    return new CompileLogger({ printToConsole: false, writeToFile: false });
  }

  private logEvent(event: LogEvent): void {
    this.events.push(event);

    const jsonLine = JSON.stringify(event);

    if (this.printToConsole) {
      console.error(jsonLine);
    }

    if (this.writeToFile) {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true });
      }
      appendFileSync(this.logPath, jsonLine + '\n');
    }
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Log compile start
   */
  start(file: string): void {
    this.startTime = Date.now();

    const event: CompileStartEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'compile_start',
      file,
    };

    this.logEvent(event);
  }

  /**
   * Log compile completion
   */
  complete(status: 'completed' | 'error', error?: string): void {
    const event: CompileCompleteEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'compile_complete',
      durationMs: Date.now() - this.startTime,
      status,
      ...(error !== undefined ? { error } : {}),
    };

    this.logEvent(event);
  }

  moduleParsed(file: string, counts: { imports: number; types: number; values: number }): void {
    const event: ModuleParsedEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'module_parsed',
      file,
      ...counts,
    };

    this.logEvent(event);
  }

  valueResolved(name: string, file: string, fields: number): void {
    const event: ValueResolvedEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'value_resolved',
      name,
      file,
      fields,
    };

    this.logEvent(event);
  }

  iconsProbed(stems: number, durationMs: number): void {
    const event: IconsProbedEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'icons_probed',
      stems,
      durationMs,
    };

    this.logEvent(event);
  }

  fileWritten(file: string, bytes: number): void {
    const event: FileWrittenEvent = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      event: 'file_written',
      file,
      bytes,
    };

    this.logEvent(event);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  /** Path of the JSONL file, or null when not writing to disk */
  getLogPath(): string | null {
    return this.writeToFile ? this.logPath : null;
  }
}
