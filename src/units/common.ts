import { z } from 'zod';
import { fieldOrigin } from '../models/record';
import { getRecordValue, ProviderRef, Unit } from '../models/unit';
import { UnitDefinitionError } from '../services/errors';
import { UnitInit, UnitIssue, UnitLookup } from './types';

export const ID_PATTERN = /^[^\s]+$/;
export const idSchema = z.string().regex(ID_PATTERN, 'identifier may not contain whitespace');
export const nonEmpty = z.string().min(1, 'may not be empty');
export const durationSchema = z.string().refine(v => Number(v) >= 0, 'must be a non-negative number of seconds');

/** Shared fields of every unit built from `init`. */
export function baseFields(init: UnitInit) {
  return {
    origin: init.origin,
    provider: init.provider,
    virtual: init.virtual ?? false,
    data: init.data,
    fieldOffsets: init.fieldOffsets ?? new Map<string, number>(),
    parameters: init.parameters
  };
}

export function read(init: UnitInit, name: string): string | undefined {
  return getRecordValue(init, name);
}

/** `namespace::partial` unless the partial id is already qualified. */
export function qualifyId(partialId: string | undefined, provider: ProviderRef | undefined): string | undefined {
  if(partialId === undefined) return undefined;
  if(!provider || partialId.includes('::')) return partialId;
  return `${provider.namespace}::${partialId}`;
}

export function parseDuration(init: UnitInit, field = 'estimated_duration'): number | undefined {
  const raw = read(init, field);
  if(raw === undefined) return undefined;
  const value = Number(raw.trim());
  if(!raw.trim() || !Number.isFinite(value)){
    throw new UnitDefinitionError(field, `field ${field}: '${raw}' is not a number`);
  }
  return value;
}

/** Compile a newline separated pattern list; one issue per bad pattern. */
export function patternIssues(unit: Unit, field: string): UnitIssue[] {
  const value = getRecordValue(unit, field);
  if(!value) return [];
  const issues: UnitIssue[] = [];
  for(const line of value.split('\n')){
    const pattern = line.trim();
    if(!pattern || pattern.startsWith('#')) continue;
    try { new RegExp(`^${pattern}$`); }
    catch(e){
      issues.push({ severity: 'error', field, message: `invalid pattern '${pattern}': ${e instanceof Error ? e.message : String(e)}`, origin: fieldOrigin(unit, field) });
    }
  }
  return issues;
}

export function duplicateIdIssues(unit: Unit & { id?: string }, lookup: UnitLookup | undefined): UnitIssue[] {
  if(!lookup || unit.id === undefined) return [];
  const others = lookup.unitsWithId(unit.id).filter(u => u !== unit);
  if(!others.length) return [];
  return [{ severity: 'warning', field: 'id', message: `identifier '${unit.id}' is also used at ${others.map(o => o.origin.toString()).join(', ')}`, origin: fieldOrigin(unit, 'id') }];
}
