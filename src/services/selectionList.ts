import path from 'path';
import { Origin } from '../models/origin';

export interface SelectionListOptions {
  name?: string;
  /** Used to derive the name when none is given. */
  filename?: string;
  origin?: Origin;
  /** Namespace prepended to patterns that are not already qualified. */
  implicitNamespace?: string;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Legacy selection list (a ".whitelist" file): one regular expression per
 * line, each matched against the whole job identifier.
 */
export class SelectionList {
  readonly name?: string;
  readonly origin?: Origin;
  readonly implicitNamespace?: string;
  readonly patterns: readonly string[];
  private readonly compiled: readonly RegExp[];

  constructor(patterns: readonly string[], options: SelectionListOptions = {}){
    this.patterns = patterns;
    this.implicitNamespace = options.implicitNamespace;
    this.origin = options.origin;
    this.name = options.name ?? (options.filename ? path.basename(options.filename, path.extname(options.filename)) : undefined);
    // invalid patterns throw here, which is what loaders rely on
    this.compiled = patterns.map(p => new RegExp(`^${this.qualify(p)}$`));
  }

  static fromText(text: string, options: SelectionListOptions = {}): SelectionList {
    const patterns = text.split('\n')
      .map(line => line.trim())
      .filter(line => line && !line.startsWith('#'));
    return new SelectionList(patterns, options);
  }

  private qualify(pattern: string): string {
    if(!this.implicitNamespace || pattern.includes('::')) return pattern;
    return `${escapeRegExp(this.implicitNamespace)}::${pattern}`;
  }

  /** Effective (qualified and anchored) regular expressions. */
  get qualifiedPatterns(): string[] {
    return this.compiled.map(r => r.source);
  }

  designates(jobId: string): boolean {
    return this.compiled.some(r => r.test(jobId));
  }
}
