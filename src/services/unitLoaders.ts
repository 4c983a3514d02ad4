import path from 'path';
import { fileSource, Origin } from '../models/origin';
import { UnitRecord } from '../models/record';
import { FileRole, FileUnit, ProviderRef, TestPlanUnit, Unit } from '../models/unit';
import { buildUnit, DEFAULT_UNIT_KIND, lookupUnitKind, UNIT_KINDS } from '../units';
import type { UnitLookup } from '../units';
import { ClassificationResult, LoaderKind } from './classificationService';
import { ContentEntry } from './contentEnumerator';
import { describeError, isLoadError, LoadError, RecordSyntaxError, UnitValidationError, UnknownUnitKindError } from './errors';
import { logDebug } from './logger';
import { parseRecords } from './recordParser';
import { SelectionList } from './selectionList';
import { checkUnit, formatIssue, validateUnit, ValidationOptions } from './validationService';

/** What loaders need to know about the provider they load for. */
export interface LoaderProvider extends ProviderRef {
  readonly whitelistsDir?: string;
  classify(file: string): ClassificationResult;
}

export interface ContentLoadOptions {
  /** Run static field validation on every unit (on by default). */
  validate: boolean;
  validation: ValidationOptions;
  /** Run live consistency checks; any error-severity issue rejects the file. */
  check: boolean;
  /** Known units for cross-unit checks (category references, duplicates). */
  context?: UnitLookup;
}

export const DEFAULT_LOAD_OPTIONS: ContentLoadOptions = Object.freeze({ validate: true, validation: {}, check: false });

/**
 * Loading a single file happens in two phases: `inspect` interprets the file
 * (and is the only phase allowed to fail), the projections then read units and
 * selection lists out of its result. `synthesize` is the separate channel for
 * units that do not appear in the text (file provenance, legacy shims).
 * Strategies call `entry.read()` only when they need the text.
 */
export interface ContentLoaderStrategy<R> {
  readonly name: string;
  inspect(entry: ContentEntry, provider: LoaderProvider | undefined, options: ContentLoadOptions): R;
  discoverUnits(result: R, entry: ContentEntry, provider: LoaderProvider | undefined): Unit[];
  discoverSelectionLists(result: R, entry: ContentEntry, provider: LoaderProvider | undefined): SelectionList[];
  synthesize(result: R, entry: ContentEntry, provider: LoaderProvider | undefined): Unit[];
}

export interface LoadResult {
  unitList: Unit[];
  selectionLists: SelectionList[];
}

/** Origin spanning a whole file, as used by synthesized units. */
export function wholeFileOrigin(file: string, text: string): Origin {
  return new Origin(fileSource(file), 1, (text.match(/\n/g) ?? []).length);
}

export function makeFileUnit(file: string, provider: LoaderProvider, role?: FileRole, base?: string): FileUnit {
  if(role === undefined){
    const classified = provider.classify(file);
    role = classified.role;
    base = classified.base;
  }
  const data = new Map<string, string>([['unit', 'file'], ['path', file], ['role', role]]);
  if(base !== undefined) data.set('base', base);
  return UNIT_KINDS.file.build({ data, origin: new Origin(fileSource(file)), provider, virtual: true });
}

function loadRecord(file: string, record: UnitRecord, provider: LoaderProvider | undefined, options: ContentLoadOptions): Unit {
  let unit: Unit;
  try {
    const kind = lookupUnitKind(record.data.get('unit') ?? DEFAULT_UNIT_KIND);
    unit = buildUnit(kind, { data: record.data, origin: record.origin, fieldOffsets: record.fieldOffsets, provider });
  } catch(e){
    if(e instanceof UnknownUnitKindError) throw new LoadError(file, e.message, e);
    throw new LoadError(file, `Cannot define unit from record ${record.origin.toString()}: ${describeError(e)}`, e);
  }
  if(options.check){
    const issue = checkUnit(unit, options.context).find(i => i.severity === 'error');
    if(issue) throw new LoadError(file, `Problem in unit definition, ${formatIssue(issue)}`);
  }
  if(options.validate){
    try {
      validateUnit(unit, options.validation);
    } catch(e){
      if(e instanceof UnitValidationError) throw new LoadError(file, `Problem in unit definition, field ${e.field}: ${e.problem}`, e);
      throw e;
    }
  }
  return unit;
}

/** Unit definition files (`.pxu`, `.txt`, `.txt.in`). */
export const unitSourceLoader: ContentLoaderStrategy<Unit[]> = {
  name: 'unit-source',
  inspect(entry, provider, options){
    const file = entry.path;
    logDebug('loader:unit-source:begin', { file });
    let records: UnitRecord[];
    try {
      records = parseRecords(entry.read(), fileSource(file));
    } catch(e){
      if(e instanceof RecordSyntaxError) throw new LoadError(file, `Cannot load job definitions from '${file}': ${e.message}`, e);
      throw e;
    }
    const units = records.map(record => loadRecord(file, record, provider, options));
    logDebug('loader:unit-source:end', { file, units: units.length });
    return units;
  },
  discoverUnits: result => result,
  discoverSelectionLists(result, _entry, provider){
    return result
      .filter((u): u is TestPlanUnit => u.kind === 'test plan')
      .filter(u => u.include !== undefined)
      .map(u => SelectionList.fromText(u.include ?? '', { name: u.partialId, origin: u.origin, implicitNamespace: provider?.namespace }));
  },
  synthesize: (_result, entry, provider) => provider ? [makeFileUnit(entry.path, provider)] : []
};

interface InspectedSelectionList {
  list: SelectionList;
  text: string;
}

/** Legacy `.whitelist` files, each of which also stands in for a test plan. */
export const selectionListLoader: ContentLoaderStrategy<InspectedSelectionList> = {
  name: 'selection-list',
  inspect(entry, provider){
    const file = entry.path;
    const text = entry.read();
    const list = SelectionList.fromText(text, { filename: file, origin: wholeFileOrigin(file, text), implicitNamespace: provider?.namespace });
    return { list, text };
  },
  discoverUnits: () => [],
  discoverSelectionLists: result => [result.list],
  synthesize({ text }, entry, provider){
    if(!provider) return [];
    const file = entry.path;
    const name = path.basename(file, path.extname(file));
    const plan = UNIT_KINDS['test plan'].build({
      data: new Map([['unit', 'test plan'], ['id', name], ['name', name], ['include', text]]),
      origin: wholeFileOrigin(file, text),
      fieldOffsets: new Map([['include', 0]]),
      provider,
      virtual: true
    });
    // the role is known here, no need to guess it from the path
    return [makeFileUnit(file, provider, 'legacy-whitelist', provider.whitelistsDir), plan];
  }
};

/** Everything else worth remembering: only the file's provenance is recorded, the text is never read. */
export const plainContentLoader: ContentLoaderStrategy<null> = {
  name: 'plain',
  inspect: () => null,
  discoverUnits: () => [],
  discoverSelectionLists: () => [],
  synthesize: (_result, entry, provider) => provider ? [makeFileUnit(entry.path, provider)] : []
};

/**
 * Runs one strategy over one file. Any failure, including reading the file,
 * comes out as a {@link LoadError} naming that file.
 */
export function runLoader<R>(strategy: ContentLoaderStrategy<R>, entry: ContentEntry, provider: LoaderProvider | undefined, options: ContentLoadOptions = DEFAULT_LOAD_OPTIONS): LoadResult {
  const file = entry.path;
  try {
    const result = strategy.inspect(entry, provider, options);
    return {
      unitList: [...strategy.discoverUnits(result, entry, provider), ...strategy.synthesize(result, entry, provider)],
      selectionLists: strategy.discoverSelectionLists(result, entry, provider)
    };
  } catch(e){
    if(isLoadError(e)) throw e;
    throw new LoadError(file, `Cannot load '${file}': ${describeError(e)}`, e);
  }
}

export function loadWith(kind: LoaderKind, entry: ContentEntry, provider: LoaderProvider | undefined, options?: ContentLoadOptions): LoadResult {
  switch(kind){
    case 'unit-source': return runLoader(unitSourceLoader, entry, provider, options);
    case 'selection-list': return runLoader(selectionListLoader, entry, provider, options);
    case 'plain': return runLoader(plainContentLoader, entry, provider, options);
  }
}
