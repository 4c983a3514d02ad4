// Error taxonomy for provider content loading.
// Every error carries a stable `code` so callers can branch on it after the
// error has crossed a loader boundary (problem lists keep the original object).
export type PclErrorCode =
  | 'record-syntax'
  | 'origin-comparison'
  | 'classification'
  | 'load'
  | 'unit-validation'
  | 'unknown-unit-kind'
  | 'unit-definition'
  | 'provider-definition';

export class PclError extends Error {
  constructor(readonly code: PclErrorCode, message: string){
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed record grammar. `msg` is the bare message without location. */
export class RecordSyntaxError extends PclError {
  constructor(readonly source: string, readonly line: number, readonly msg: string){
    super('record-syntax', `${source}:${line}: ${msg}`);
  }
}

export class OriginComparisonError extends PclError {
  constructor(message: string){ super('origin-comparison', message); }
}

export class ClassificationError extends PclError {
  constructor(readonly path: string){ super('classification', `Unable to classify: '${path}'`); }
}

/** Any failure while loading one file. Always attributable to `file`. */
export class LoadError extends PclError {
  constructor(readonly file: string, message: string, readonly cause?: unknown){
    super('load', message);
  }
}

export type ValidationProblem = 'missing' | 'wrong' | 'useless' | 'deprecated';

export class UnitValidationError extends PclError {
  constructor(readonly field: string, readonly problem: ValidationProblem, detail?: string){
    super('unit-validation', detail ? `field ${field}: ${problem} (${detail})` : `field ${field}: ${problem}`);
  }
}

export class UnknownUnitKindError extends PclError {
  constructor(readonly kind: string){ super('unknown-unit-kind', `Unknown unit type: '${kind}'`); }
}

export class UnitDefinitionError extends PclError {
  constructor(readonly field: string, message: string){ super('unit-definition', message); }
}

export class ProviderDefinitionError extends PclError {
  constructor(readonly field: string, readonly problem: string){
    super('provider-definition', `Problem in provider definition, field '${field}': ${problem}`);
  }
}

export function isPclError(e: unknown): e is PclError {
  return e instanceof PclError;
}

export function isLoadError(e: unknown): e is LoadError {
  return e instanceof LoadError;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** `code` of a Node system error (`ENOENT`, `EACCES`, ...). */
export function errnoCode(e: unknown): string | undefined {
  if(e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}
