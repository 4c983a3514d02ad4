import fs from 'fs';
import path from 'path';
import { JobUnit, Unit } from '../models/unit';
import { ClassificationResult, ContentClassifier, ProviderDirectories, readExecutablesHint } from './classificationService';
import { ContentEnumerator, contentDirectories, ContentSource } from './contentEnumerator';
import { ContentLoader, ContentLoadSummary } from './contentLoader';
import { errnoCode, LoadError } from './errors';
import { SelectionList } from './selectionList';
import { ContentLoadOptions, DEFAULT_LOAD_OPTIONS, LoaderProvider, runLoader, selectionListLoader } from './unitLoaders';

/** Directories a provider may declare explicitly; the rest derive from `baseDir`. */
export type DeclaredDirectories = Pick<ProviderDirectories,
  'baseDir' | 'unitsDir' | 'jobsDir' | 'whitelistsDir' | 'dataDir' | 'binDir' | 'localeDir'>;

export interface ProviderInit {
  name: string;
  version: string;
  description?: string;
  /** Loaded from one of the secure provider paths. */
  secure?: boolean;
  gettextDomain?: string;
  dirs: DeclaredDirectories;
  loaderOptions?: ContentLoadOptions;
  /** Replaces the file system walk; mostly useful in tests. */
  content?: ContentSource;
}

export interface UnitsAndProblems<U extends Unit = Unit> {
  unitList: U[];
  problemList: LoadError[];
}

export function deriveDirectories(dirs: DeclaredDirectories): ProviderDirectories {
  const base = dirs.baseDir;
  if(!base) return { ...dirs };
  return {
    ...dirs,
    buildDir: path.join(base, 'build'),
    buildBinDir: path.join(base, 'build', 'bin'),
    buildMoDir: path.join(base, 'build', 'mo'),
    poDir: path.join(base, 'po'),
    srcDir: path.join(base, 'src')
  };
}

const compareStrings = (a = '', b = '') => a < b ? -1 : a > b ? 1 : 0;

/** Full paths of the executable files directly inside `dir`. */
function listExecutables(dir: string | undefined): string[] {
  if(!dir) return [];
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch(e){
    if(errnoCode(e) === 'ENOENT') return [];
    throw e;
  }
  return names.map(n => path.join(dir, n)).filter(f => {
    try { fs.accessSync(f, fs.constants.F_OK | fs.constants.X_OK); return true; }
    catch { return false; }
  });
}

/**
 * A named, versioned collection of directories whose files define units.
 * The provider owns its classifier and its content loader exclusively.
 */
export class Provider implements LoaderProvider {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly secure: boolean;
  readonly gettextDomain?: string;
  readonly dirs: ProviderDirectories;
  readonly loaderOptions: ContentLoadOptions;
  private readonly classifier: ContentClassifier;
  private readonly content: ContentLoader;

  constructor(init: ProviderInit){
    this.name = init.name;
    this.version = init.version;
    this.description = init.description;
    this.secure = init.secure ?? false;
    this.gettextDomain = init.gettextDomain;
    this.dirs = deriveDirectories(init.dirs);
    this.loaderOptions = init.loaderOptions ?? DEFAULT_LOAD_OPTIONS;
    this.classifier = new ContentClassifier(this.dirs);
    this.content = new ContentLoader(this, init.content ?? new ContentEnumerator(contentDirectories(this.dirs)));
  }

  /** Name part before the first colon, used to qualify partial identifiers. */
  get namespace(): string {
    return this.name.split(':', 1)[0] ?? this.name;
  }

  get baseDir(): string | undefined { return this.dirs.baseDir; }
  get unitsDir(): string | undefined { return this.dirs.unitsDir; }
  get jobsDir(): string | undefined { return this.dirs.jobsDir; }
  get whitelistsDir(): string | undefined { return this.dirs.whitelistsDir; }
  get dataDir(): string | undefined { return this.dirs.dataDir; }
  get binDir(): string | undefined { return this.dirs.binDir; }
  get localeDir(): string | undefined { return this.dirs.localeDir; }
  get buildBinDir(): string | undefined { return this.dirs.buildBinDir; }
  get srcDir(): string | undefined { return this.dirs.srcDir; }

  classify(file: string): ClassificationResult {
    return this.classifier.classify(file);
  }

  /** Reload every file; replaces all previously loaded content. */
  load(options: ContentLoadOptions = this.loaderOptions): UnitsAndProblems {
    this.content.load(options);
    return { unitList: this.content.unitList, problemList: this.content.problemList };
  }

  get isLoaded(): boolean { return this.content.isLoaded; }
  get unitList(): readonly Unit[] { return this.content.unitList; }
  get problemList(): readonly LoadError[] { return this.content.problemList; }
  get selectionLists(): readonly SelectionList[] { return this.content.selectionLists; }
  get idMap(): ReadonlyMap<string, readonly Unit[]> { return this.content.idMap; }
  get pathMap(): ReadonlyMap<string, readonly Unit[]> { return this.content.pathMap; }
  get lastSummary(): ContentLoadSummary | undefined { return this.content.lastSummary; }

  /** All units in discovery order, loading on first use. */
  getUnits(): UnitsAndProblems {
    if(!this.content.isLoaded) this.content.load(this.loaderOptions);
    return { unitList: [...this.content.unitList], problemList: [...this.content.problemList] };
  }

  /** Jobs sorted by identifier, plus every problem met while loading. */
  loadAllJobs(): UnitsAndProblems<JobUnit> {
    const { unitList, problemList } = this.getUnits();
    const jobs = unitList.filter((u): u is JobUnit => u.kind === 'job');
    jobs.sort((a, b) => compareStrings(a.id, b.id));
    return { unitList: jobs, problemList };
  }

  /** Like {@link loadAllJobs} but the first problem is thrown. */
  getBuiltinJobs(): JobUnit[] {
    const { unitList, problemList } = this.loadAllJobs();
    if(problemList[0]) throw problemList[0];
    return unitList;
  }

  /** Selection lists of the whitelists directory, sorted by name. */
  getBuiltinWhitelists(): SelectionList[] {
    const dir = this.whitelistsDir;
    if(!dir) return [];
    const walker = new ContentEnumerator([dir]);
    const lists: SelectionList[] = [];
    for(const entry of walker.entries()){
      if(!entry.path.endsWith('.whitelist')) continue;
      lists.push(...runLoader(selectionListLoader, entry, this, this.loaderOptions).selectionLists);
    }
    if(walker.problemList[0]) throw walker.problemList[0];
    return lists.sort((a, b) => compareStrings(a.name, b.name));
  }

  /**
   * Executables shipped in the bin directory and built into build/bin. When
   * `src/EXECUTABLES` lists names only those are taken from build/bin.
   */
  getAllExecutables(): string[] {
    const hinted = readExecutablesHint(this.srcDir);
    const buildBin = this.buildBinDir;
    const built = buildBin && hinted.size
      ? [...hinted].map(n => path.join(buildBin, n))
      : listExecutables(buildBin);
    return [...listExecutables(this.binDir), ...built].sort();
  }

  /** Translation catalogs are not consulted; the message id is returned as is. */
  getTranslatedData(msgid: string | undefined): string | undefined {
    return msgid;
  }

  toString(): string {
    return `<Provider name:'${this.name}'>`;
  }
}
