import { CategoryUnit, FileUnit, JobUnit, TestPlanUnit, Unit, UnitKind } from '../models/unit';
import { UnknownUnitKindError } from '../services/errors';
import { categoryKind } from './category';
import { fileKind } from './file';
import { jobKind } from './job';
import { testPlanKind } from './testPlan';
import { UnitInit, UnitIssue, UnitKindDefinition, UnitLookup } from './types';

export type { UnitInit, UnitIssue, UnitLookup, FieldRule, IssueSeverity, UnitKindDefinition } from './types';

interface UnitKindRegistry {
  readonly job: UnitKindDefinition<JobUnit>;
  readonly category: UnitKindDefinition<CategoryUnit>;
  readonly 'test plan': UnitKindDefinition<TestPlanUnit>;
  readonly file: UnitKindDefinition<FileUnit>;
}

/** Every unit kind, keyed by the value of the `unit:` field. */
export const UNIT_KINDS: UnitKindRegistry = {
  job: jobKind,
  category: categoryKind,
  'test plan': testPlanKind,
  file: fileKind
};

export const DEFAULT_UNIT_KIND: UnitKind = 'job';

export function isUnitKind(name: string): name is UnitKind {
  return Object.prototype.hasOwnProperty.call(UNIT_KINDS, name);
}

export function lookupUnitKind(name: string): UnitKind {
  if(!isUnitKind(name)) throw new UnknownUnitKindError(name);
  return name;
}

export function buildUnit(kind: UnitKind, init: UnitInit): Unit {
  switch(kind){
    case 'job': return UNIT_KINDS.job.build(init);
    case 'category': return UNIT_KINDS.category.build(init);
    case 'test plan': return UNIT_KINDS['test plan'].build(init);
    case 'file': return UNIT_KINDS.file.build(init);
  }
}

export function checkUnitKind(unit: Unit, lookup?: UnitLookup): UnitIssue[] {
  switch(unit.kind){
    case 'job': return UNIT_KINDS.job.check(unit, lookup);
    case 'category': return UNIT_KINDS.category.check(unit, lookup);
    case 'test plan': return UNIT_KINDS['test plan'].check(unit, lookup);
    case 'file': return UNIT_KINDS.file.check(unit, lookup);
  }
}
