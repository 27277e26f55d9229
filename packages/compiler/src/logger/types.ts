// Structured log events for a compiler run (JSONL format)

interface LogEventBase {
  seq: number;           // Sequential event number (1, 2, 3, ...)
  ts: string;            // ISO timestamp
  event: string;         // Event type
}

export interface CompileStartEvent extends LogEventBase {
  event: 'compile_start';
  file: string;
}

export interface CompileCompleteEvent extends LogEventBase {
  event: 'compile_complete';
  durationMs: number;
  status: 'completed' | 'error';
  error?: string;
}

export interface ModuleParsedEvent extends LogEventBase {
  event: 'module_parsed';
  file: string;
  imports: number;
  types: number;
  values: number;
}

export interface ValueResolvedEvent extends LogEventBase {
  event: 'value_resolved';
  name: string;
  file: string;
  fields: number;        // 0 for simple values
}

export interface IconsProbedEvent extends LogEventBase {
  event: 'icons_probed';
  stems: number;         // Distinct path stems probed
  durationMs: number;
}

export interface FileWrittenEvent extends LogEventBase {
  event: 'file_written';
  file: string;
  bytes: number;
}

export type LogEvent =
  | CompileStartEvent
  | CompileCompleteEvent
  | ModuleParsedEvent
  | ValueResolvedEvent
  | IconsProbedEvent
  | FileWrittenEvent;
