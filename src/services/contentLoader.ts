import { getRuntimeConfig, RuntimeConfig } from '../config/runtimeConfig';
import { Unit, unitIdentifier, unitPath } from '../models/unit';
import { ContentSource } from './contentEnumerator';
import { ClassificationResult } from './classificationService';
import { describeError, isPclError, LoadError } from './errors';
import { log } from './logger';
import { SelectionList } from './selectionList';
import { emitTrace, traceEnabled } from './tracing';
import { ContentLoadOptions, DEFAULT_LOAD_OPTIONS, LoaderProvider, loadWith } from './unitLoaders';

// Reason buckets are keyed `loaded:<role>`, `ignored:<role>` or `failed:<role>`.
export interface ContentLoadSummary {
  scanned: number;
  loaded: number;
  ignored: number;
  failed: number;
  units: number;
  reasons: Record<string, number>;
  durationMs: number;
}

/** Explicit loader options derived from the process configuration. */
export function loaderOptionsFromConfig(cfg: RuntimeConfig = getRuntimeConfig()): ContentLoadOptions {
  return {
    validate: cfg.loader.validate,
    check: cfg.loader.check,
    validation: { strict: cfg.loader.strict, deprecated: cfg.loader.deprecated }
  };
}

/**
 * Loads every file a provider owns and indexes the resulting units. Each
 * `load()` starts from scratch; a file that fails to load is recorded in
 * `problemList` and never stops the rest of the pass.
 */
export class ContentLoader {
  isLoaded = false;
  unitList: Unit[] = [];
  selectionLists: SelectionList[] = [];
  problemList: LoadError[] = [];
  /** identifier -> units declaring it; duplicates are kept */
  idMap = new Map<string, Unit[]>();
  /** path -> units describing that file */
  pathMap = new Map<string, Unit[]>();
  lastSummary?: ContentLoadSummary;

  constructor(private readonly provider: LoaderProvider, private readonly content: ContentSource){}

  load(options: ContentLoadOptions = DEFAULT_LOAD_OPTIONS): void {
    const start = Date.now();
    this.unitList = [];
    this.selectionLists = [];
    this.problemList = [];
    this.idMap = new Map();
    this.pathMap = new Map();
    this.isLoaded = false;
    log('info', 'content:load-begin', { provider: this.provider.name });

    const reasons: Record<string, number> = {};
    const bump = (r: string) => { reasons[r] = (reasons[r] || 0) + 1; };
    let loaded = 0, ignored = 0, failed = 0;

    const entries = this.content.entries();
    entries.forEach((entry, index) => {
      if(traceEnabled(1)) emitTrace('[trace:content:file-begin]', { file: entry.path, index, total: entries.length });
      let classified: ClassificationResult;
      try {
        classified = this.provider.classify(entry.path);
      } catch(e){
        // a file system error while examining a file costs that file only
        const message = isPclError(e) ? e.message : `Cannot load '${entry.path}': ${describeError(e)}`;
        this.problemList.push(new LoadError(entry.path, message, e));
        failed++;
        bump('failed:unclassified');
        log('warn', 'content:file-unclassified', { provider: this.provider.name, file: entry.path, msg: message });
        if(traceEnabled(1)) emitTrace('[trace:content:file-end]', { file: entry.path, loaded: false, error: message });
        return;
      }
      const { role, loader } = classified;
      if(loader === null){
        ignored++;
        bump(`ignored:${role}`);
        if(traceEnabled(1)) emitTrace('[trace:content:file-end]', { file: entry.path, role, loaded: false });
        return;
      }
      try {
        const result = loadWith(loader, entry, this.provider, options);
        this.unitList.push(...result.unitList);
        this.selectionLists.push(...result.selectionLists);
        for(const unit of result.unitList) this.index(unit);
        loaded++;
        bump(`loaded:${role}`);
        if(traceEnabled(1)) emitTrace('[trace:content:file-end]', { file: entry.path, role, loaded: true, units: result.unitList.length });
      } catch(e){
        if(!(e instanceof LoadError)) throw e;
        this.problemList.push(e);
        failed++;
        bump(`failed:${role}`);
        log('warn', 'content:file-failed', { provider: this.provider.name, file: entry.path, msg: e.message });
        if(traceEnabled(1)) emitTrace('[trace:content:file-end]', { file: entry.path, role, loaded: false, error: e.message });
      }
    });
    this.problemList.push(...this.content.problemList);
    this.isLoaded = true;

    this.lastSummary = {
      scanned: entries.length,
      loaded,
      ignored,
      failed,
      units: this.unitList.length,
      reasons,
      durationMs: Date.now() - start
    };
    log('info', 'content:load-end', { provider: this.provider.name, ms: this.lastSummary.durationMs, data: { ...this.lastSummary, problems: this.problemList.length } });
  }

  private index(unit: Unit): void {
    const id = unitIdentifier(unit);
    if(id !== undefined) appendTo(this.idMap, id, unit);
    const file = unitPath(unit);
    if(file !== undefined) appendTo(this.pathMap, file, unit);
  }
}

function appendTo(map: Map<string, Unit[]>, key: string, unit: Unit): void {
  const list = map.get(key);
  if(list) list.push(unit); else map.set(key, [unit]);
}
