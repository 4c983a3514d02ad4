import type { ZodTypeAny } from 'zod';
import type { Origin } from '../models/origin';
import type { ProviderRef, Unit, UnitKind } from '../models/unit';

/** Everything a unit constructor needs besides the record itself. */
export interface UnitInit {
  readonly data: ReadonlyMap<string, string>;
  readonly origin: Origin;
  readonly fieldOffsets?: ReadonlyMap<string, number>;
  readonly provider?: ProviderRef;
  readonly parameters?: Readonly<Record<string, string>>;
  readonly virtual?: boolean;
}

export interface FieldRule<U extends Unit> {
  readonly field: string;
  /** Shape of the value when present (applied to the raw string). */
  readonly schema?: ZodTypeAny;
  readonly required?: boolean | ((unit: U) => boolean);
  /** Strict mode only: the field has no effect for this unit. */
  readonly useless?: (unit: U) => boolean;
  /** Deprecated-mode only: the field should not be used any more. */
  readonly deprecated?: boolean;
}

export type IssueSeverity = 'error' | 'warning' | 'advice';

export interface UnitIssue {
  readonly severity: IssueSeverity;
  readonly field?: string;
  readonly message: string;
  readonly origin: Origin;
}

/** Read-only view of already known units, used by live checks. */
export interface UnitLookup {
  unitsWithId(id: string): readonly Unit[];
}

export interface UnitKindDefinition<U extends Unit> {
  readonly kind: UnitKind;
  build(init: UnitInit): U;
  readonly rules: readonly FieldRule<U>[];
  check(unit: U, lookup?: UnitLookup): UnitIssue[];
}
