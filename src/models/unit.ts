import { Origin } from './origin';

export type UnitKind = 'job' | 'category' | 'test plan' | 'file';

export const FILE_ROLES = [
  'unit-source', 'legacy-whitelist', 'script', 'binary', 'data', 'i18n',
  'manage_py', 'legal', 'docs', 'build', 'src', 'vcs', 'unknown'
] as const;
export type FileRole = typeof FILE_ROLES[number];

export function isFileRole(value: string): value is FileRole {
  return FILE_ROLES.some(role => role === value);
}

/**
 * What a unit may know about the provider it belongs to. The unit never owns
 * the provider; it only uses it for namespacing and translation lookups.
 */
export interface ProviderRef {
  readonly name: string;
  readonly namespace: string;
  getTranslatedData(msgid: string | undefined): string | undefined;
}

interface UnitBase<K extends UnitKind> {
  readonly kind: K;
  readonly origin: Origin;
  readonly provider?: ProviderRef;
  /** Synthesized by a loader rather than read verbatim from a record. */
  readonly virtual: boolean;
  readonly data: ReadonlyMap<string, string>;
  readonly fieldOffsets: ReadonlyMap<string, number>;
  /** Template parameters substituted into `{name}` placeholders on lookup. */
  readonly parameters?: Readonly<Record<string, string>>;
}

export interface JobUnit extends UnitBase<'job'> {
  readonly id?: string;
  readonly partialId?: string;
  readonly summary?: string;
  readonly plugin?: string;
  readonly command?: string;
  readonly description?: string;
  readonly categoryId?: string;
  readonly estimatedDuration?: number;
  readonly depends?: string;
  readonly requires?: string;
  readonly user?: string;
  readonly flags: readonly string[];
}

export interface CategoryUnit extends UnitBase<'category'> {
  readonly id?: string;
  readonly partialId?: string;
  readonly name?: string;
}

export interface TestPlanUnit extends UnitBase<'test plan'> {
  readonly id?: string;
  readonly partialId?: string;
  readonly name?: string;
  readonly description?: string;
  readonly include?: string;
  readonly exclude?: string;
  readonly estimatedDuration?: number;
}

export interface FileUnit extends UnitBase<'file'> {
  readonly path?: string;
  readonly role: FileRole;
  readonly base?: string;
}

export type Unit = JobUnit | CategoryUnit | TestPlanUnit | FileUnit;

/** Identifier a unit is indexed under, for kinds that declare one. */
export function unitIdentifier(unit: Unit): string | undefined {
  switch(unit.kind){
    case 'job':
    case 'category':
    case 'test plan':
      return unit.id;
    case 'file':
      return undefined;
    default: {
      const never: never = unit;
      return never;
    }
  }
}

/** Path a unit is indexed under, for kinds that declare one. */
export function unitPath(unit: Unit): string | undefined {
  switch(unit.kind){
    case 'file':
      return unit.path;
    case 'job':
    case 'category':
    case 'test plan':
      return undefined;
    default: {
      const never: never = unit;
      return never;
    }
  }
}

export function describeUnit(unit: Unit): string {
  const ident = unit.kind === 'file' ? unit.path : unit.id;
  return `${unit.kind} ${ident === undefined ? '(anonymous)' : `'${ident}'`} at ${unit.origin.toString()}`;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Raw value of a field. The translatable spelling (`_name`) wins over the
 * plain one; template parameters are substituted when the unit has any.
 */
export function getRecordValue(unit: Pick<Unit, 'data' | 'parameters'>, name: string): string | undefined {
  const value = unit.data.get('_' + name) ?? unit.data.get(name);
  const params = unit.parameters;
  if(value === undefined || !params) return value;
  return value.replace(PLACEHOLDER, (whole, param: string) => params[param] ?? whole);
}

/** Like {@link getRecordValue} but passed through the provider's translations. */
export function getTranslatedRecordValue(unit: Unit, name: string): string | undefined {
  const value = getRecordValue(unit, name);
  if(!unit.provider || !unit.data.has('_' + name)) return value;
  return unit.provider.getTranslatedData(value);
}
