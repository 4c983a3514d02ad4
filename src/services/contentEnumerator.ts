import fs from 'fs';
import path from 'path';
import { describeError, errnoCode, LoadError } from './errors';
import type { ProviderDirectories } from './classificationService';

/** One discovered file. Its text is read on the first `read()` call only. */
export interface ContentEntry {
  readonly path: string;
  read(): string;
}

export interface ContentSource {
  entries(): ContentEntry[];
  readonly problemList: readonly LoadError[];
}

function lazyEntry(file: string): ContentEntry {
  let text: string | undefined;
  return {
    path: file,
    read(){
      if(text === undefined) text = fs.readFileSync(file, 'utf8');
      return text;
    }
  };
}

/**
 * Directories to walk for a provider. A provider with a base directory uses the
 * source layout (base plus the build outputs, which may live elsewhere); one
 * without uses the flat installed layout.
 */
export function contentDirectories(dirs: ProviderDirectories): string[] {
  const list = dirs.baseDir
    ? [dirs.baseDir, dirs.srcDir, dirs.buildBinDir, dirs.buildMoDir]
    : [dirs.unitsDir, dirs.jobsDir, dirs.dataDir, dirs.binDir, dirs.localeDir, dirs.whitelistsDir];
  return list.filter((d): d is string => !!d);
}

/**
 * Recursive file walk over a fixed list of directories. Missing directories are
 * skipped; any other directory error propagates. Symbolic links to files are
 * listed, links to directories are not followed. Files that cannot be stat'ed
 * are reported through `problemList` and left out.
 */
export class ContentEnumerator implements ContentSource {
  private problems: LoadError[] = [];

  constructor(readonly dirList: readonly string[]){}

  get problemList(): readonly LoadError[] { return this.problems; }

  entries(): ContentEntry[] {
    this.problems = [];
    const seen = new Set<string>();
    const out: ContentEntry[] = [];
    for(const dir of this.dirList) this.walk(path.resolve(dir), seen, out);
    return out;
  }

  private walk(dir: string, seen: Set<string>, out: ContentEntry[]): void {
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch(e){
      if(errnoCode(e) === 'ENOENT') return;
      throw e;
    }
    names.sort();
    for(const name of names){
      const full = path.join(dir, name);
      let stat: fs.Stats;
      let linked = false;
      try {
        stat = fs.lstatSync(full);
        if(stat.isSymbolicLink()){
          linked = true;
          stat = fs.statSync(full);
        }
      } catch(e){
        this.problems.push(new LoadError(full, `Cannot load '${full}': ${describeError(e)}`, e));
        continue;
      }
      if(stat.isDirectory()){
        // links to directories are not followed
        if(!linked) this.walk(full, seen, out);
      } else if(!seen.has(full)){
        seen.add(full);
        out.push(lazyEntry(full));
      }
    }
  }
}

/** In-memory content, for callers that already hold the text. */
export class StaticContentSource implements ContentSource {
  readonly problemList: readonly LoadError[] = [];

  constructor(private readonly files: ReadonlyArray<readonly [string, string]>){}

  entries(): ContentEntry[] {
    return this.files.map(([file, text]) => ({ path: file, read: () => text }));
  }
}
