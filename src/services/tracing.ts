import fs from 'fs';
import path from 'path';
import { getRuntimeConfig } from '../config/runtimeConfig';

export type TraceLevel = 0|1|2|3|4;

export interface TraceRecord {
  ts: string;
  seq: number;
  lvl: TraceLevel;
  label: string;
  /** First label token after `trace`, e.g. `content` for `[trace:content:file-begin]`. */
  category?: string;
  data?: unknown;
  pid: number;
}

let seq = 0;
let sink: { file: string; stream: fs.WriteStream } | null = null;

export function currentTraceLevel(): TraceLevel {
  return getRuntimeConfig().tracing.level;
}

export function traceEnabled(min: TraceLevel = 1): boolean {
  return currentTraceLevel() >= min;
}

/** `[trace:content:file-begin]` -> `['content', 'file-begin']` */
export function labelTokens(label: string): string[] {
  return label
    .replace(/^\[/, '')
    .replace(/]$/, '')
    .split(':')
    .map(s => s.trim())
    .filter(s => s && s !== 'trace');
}

/** An empty category set lets everything through (PCL_TRACE_CATEGORIES unset). */
export function categoriesAllow(label: string, categories: ReadonlySet<string>): boolean {
  if (!categories.size) return true;
  return labelTokens(label).some(token => categories.has(token));
}

function traceSink(file: string): fs.WriteStream {
  if (sink && sink.file === file) return sink.stream;
  fs.mkdirSync(path.dirname(file), { recursive: true });
  sink = { file, stream: fs.createWriteStream(file, { flags: 'a' }) };
  return sink.stream;
}

export function emitTrace(label: string, data: unknown, min: TraceLevel = 1): void {
  const tracing = getRuntimeConfig().tracing;
  if (!traceEnabled(min)) return;
  if (!categoriesAllow(label, tracing.categories)) return;

  const rec: TraceRecord = {
    ts: new Date().toISOString(),
    seq: ++seq,
    lvl: tracing.level,
    label,
    category: labelTokens(label)[0],
    data,
    pid: process.pid,
  };
  const line = `${label} ${JSON.stringify(rec)}`;
  // eslint-disable-next-line no-console
  console.error(line);
  if (tracing.file) traceSink(tracing.file).write(line + '\n');
}

export function getTraceFile(): string | null { return sink ? sink.file : null; }
