import { getRecordValue, Unit, unitIdentifier } from '../models/unit';
import { checkUnitKind, UNIT_KINDS } from '../units';
import { FieldRule, UnitIssue, UnitLookup } from '../units/types';
import { UnitValidationError } from './errors';

export interface ValidationOptions {
  /** Reject fields that have no effect on the unit. */
  strict?: boolean;
  /** Reject fields that are deprecated. */
  deprecated?: boolean;
}

// Simple counters for diagnostics (validated vs rejected units)
interface ValidationCounters { validated: number; rejected: number; checked: number; checkErrors: number }
const validationCounters: ValidationCounters = { validated: 0, rejected: 0, checked: 0, checkErrors: 0 };

function applyRules<U extends Unit>(unit: U, rules: readonly FieldRule<U>[], options: ValidationOptions): void {
  for(const rule of rules){
    const value = getRecordValue(unit, rule.field);
    if(value === undefined){
      const required = typeof rule.required === 'function' ? rule.required(unit) : !!rule.required;
      if(required) throw new UnitValidationError(rule.field, 'missing');
      continue;
    }
    if(options.deprecated && rule.deprecated) throw new UnitValidationError(rule.field, 'deprecated');
    if(options.strict && rule.useless && rule.useless(unit)) throw new UnitValidationError(rule.field, 'useless');
    if(rule.schema){
      const res = rule.schema.safeParse(value);
      if(!res.success) throw new UnitValidationError(rule.field, 'wrong', res.error.issues[0]?.message);
    }
  }
}

function applyKindRules(unit: Unit, options: ValidationOptions): void {
  switch(unit.kind){
    case 'job': return applyRules(unit, UNIT_KINDS.job.rules, options);
    case 'category': return applyRules(unit, UNIT_KINDS.category.rules, options);
    case 'test plan': return applyRules(unit, UNIT_KINDS['test plan'].rules, options);
    case 'file': return applyRules(unit, UNIT_KINDS.file.rules, options);
  }
}

/**
 * Static validation of one unit. Throws {@link UnitValidationError} naming the
 * first offending field; never mutates the unit.
 */
export function validateUnit(unit: Unit, options: ValidationOptions = {}): void {
  try {
    applyKindRules(unit, options);
    validationCounters.validated++;
  } catch(e){
    validationCounters.rejected++;
    throw e;
  }
}

/** Live consistency checks; `lookup` enables cross-unit checks. */
export function checkUnit(unit: Unit, lookup?: UnitLookup): UnitIssue[] {
  const issues = checkUnitKind(unit, lookup);
  validationCounters.checked++;
  validationCounters.checkErrors += issues.filter(i => i.severity === 'error').length;
  return issues;
}

export function formatIssue(issue: UnitIssue): string {
  const where = issue.origin.toString();
  return issue.field ? `${where}: field ${issue.field}: ${issue.message}` : `${where}: ${issue.message}`;
}

/** Identifier index over a fixed set of units, for live checks. */
export class UnitCheckContext implements UnitLookup {
  private readonly byId = new Map<string, Unit[]>();

  constructor(units: Iterable<Unit> = []){
    for(const unit of units) this.add(unit);
  }

  add(unit: Unit): void {
    const id = unitIdentifier(unit);
    if(id === undefined) return;
    const list = this.byId.get(id);
    if(list) list.push(unit); else this.byId.set(id, [unit]);
  }

  unitsWithId(id: string): readonly Unit[] {
    return this.byId.get(id) ?? [];
  }
}

export function getValidationMetrics(): ValidationCounters { return { ...validationCounters }; }
