import { OriginComparisonError } from '../services/errors';

export interface FileTextSource { readonly kind: 'file'; readonly filename: string }
export interface UnknownTextSource { readonly kind: 'unknown' }
/** Data defined in code; `filename` is the module that built it. */
export interface CallerTextSource { readonly kind: 'caller'; readonly filename: string }

export type TextSource = FileTextSource | UnknownTextSource | CallerTextSource;

export const fileSource = (filename: string): FileTextSource => ({ kind: 'file', filename });
export const UNKNOWN_SOURCE: UnknownTextSource = Object.freeze({ kind: 'unknown' });
export const callerSource = (filename: string): CallerTextSource => ({ kind: 'caller', filename });

export function sourceToString(source: TextSource): string {
  return source.kind === 'unknown' ? '???' : source.filename;
}

export function sourcesEqual(a: TextSource, b: TextSource): boolean {
  if(a.kind !== b.kind) return false;
  if(a.kind === 'unknown' || b.kind === 'unknown') return true;
  return a.filename === b.filename;
}

export function compareSources(a: TextSource, b: TextSource): number {
  if(a.kind !== b.kind){
    throw new OriginComparisonError(`Cannot order ${a.kind} source '${sourceToString(a)}' against ${b.kind} source '${sourceToString(b)}'`);
  }
  if(a.kind === 'unknown' || b.kind === 'unknown') return 0;
  return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0;
}

function cmp(a: number | undefined, b: number | undefined): number {
  return (a ?? 0) - (b ?? 0);
}

/**
 * Where a piece of data came from: a source plus an inclusive line span.
 * Lines are 1-based; both ends are optional for whole-file origins.
 */
export class Origin {
  constructor(readonly source: TextSource, readonly lineStart?: number, readonly lineEnd?: number){}

  static unknown(): Origin { return new Origin(UNKNOWN_SOURCE); }

  /**
   * Origin pointing at the module that called the function asking for it.
   * `back` skips additional frames above the immediate caller.
   */
  static fromCaller(back = 0): Origin {
    const stack = new Error().stack ?? '';
    // frame 0 is "Error", 1 is this function, 2 the caller
    const frames = stack.split('\n').slice(2 + back);
    for(const frame of frames){
      const m = frame.match(/\(?((?:file:\/\/)?[^\s()]+):(\d+):\d+\)?\s*$/);
      if(m && m[1] && m[2]){
        const line = Number(m[2]);
        return new Origin(callerSource(m[1].replace(/^file:\/\//, '')), line, line);
      }
    }
    return Origin.unknown();
  }

  equals(other: Origin): boolean {
    return sourcesEqual(this.source, other.source) && this.lineStart === other.lineStart && this.lineEnd === other.lineEnd;
  }

  /** Total order by (source, lineStart, lineEnd); throws across source kinds. */
  compare(other: Origin): number {
    return compareSources(this.source, other.source) || cmp(this.lineStart, other.lineStart) || cmp(this.lineEnd, other.lineEnd);
  }

  withOffset(offset: number): Origin {
    if(this.lineStart === undefined || this.lineEnd === undefined) return this;
    return new Origin(this.source, this.lineStart + offset, this.lineEnd + offset);
  }

  /** Same origin collapsed to its first line. */
  justLine(): Origin {
    return new Origin(this.source, this.lineStart, this.lineStart);
  }

  withSpan(lineStart: number, lineEnd: number): Origin {
    return new Origin(this.source, lineStart, lineEnd);
  }

  toString(): string {
    const src = sourceToString(this.source);
    if(this.lineStart === undefined) return src;
    if(this.lineEnd === undefined || this.lineEnd === this.lineStart) return `${src}:${this.lineStart}`;
    return `${src}:${this.lineStart}-${this.lineEnd}`;
  }
}
