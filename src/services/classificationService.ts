import fs from 'fs';
import path from 'path';
import { FileRole } from '../models/unit';
import { ClassificationError } from './errors';

/** Directories a provider declares. Every entry is optional. */
export interface ProviderDirectories {
  baseDir?: string;
  unitsDir?: string;
  jobsDir?: string;
  whitelistsDir?: string;
  dataDir?: string;
  binDir?: string;
  localeDir?: string;
  buildDir?: string;
  buildBinDir?: string;
  buildMoDir?: string;
  poDir?: string;
  srcDir?: string;
}

/**
 * Loader strategy a classified file should go through; `null` means the file is
 * acknowledged but intentionally not loaded.
 */
export type LoaderKind = 'unit-source' | 'selection-list' | 'plain';

export interface ClassificationResult {
  role: FileRole;
  /** Directory to subtract from the path to relocate the file. */
  base?: string;
  loader: LoaderKind | null;
}

export type ClassifyRule = (file: string) => ClassificationResult | undefined;

const UNIT_SOURCE_SUFFIXES = ['.txt', '.txt.in', '.pxu'];
const LEGAL_NAMES = new Set(['COPYING', 'COPYING.LESSER', 'LICENSE']);
const DOC_NAMES = new Set(['README', 'README.md', 'README.rst', 'README.txt']);
const VCS_FILES = new Set(['.gitignore', '.bzrignore']);
const VCS_DIRS = new Set(['.git', '.bzr']);

/** True when `file` lies somewhere below `dir` (whole path segments, never a string prefix). */
export function isWithin(file: string, dir: string): boolean {
  const rel = path.relative(dir, file);
  if(!rel || path.isAbsolute(rel)) return false;
  return rel.split(path.sep)[0] !== '..';
}

function isExecutable(file: string): boolean {
  try { fs.accessSync(file, fs.constants.F_OK | fs.constants.X_OK); return true; }
  catch { return false; }
}

/** Scripts start with a shebang; anything else executable is a binary. */
function executableRole(file: string): FileRole {
  const head = Buffer.alloc(2);
  const fd = fs.openSync(file, 'r');
  try {
    const n = fs.readSync(fd, head, 0, 2, 0);
    return n === 2 && head.toString('latin1') === '#!' ? 'script' : 'binary';
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Assigns every provider file a role, a relocation base and a loader strategy.
 * Rules are tried in a fixed order and the first match wins, so more specific
 * directories shadow the catch-alls that apply to the whole base directory.
 */
export class ContentClassifier {
  private rules?: ClassifyRule[];
  private executables?: ReadonlySet<string>;

  constructor(private readonly dirs: ProviderDirectories){}

  classify(file: string): ClassificationResult {
    for(const rule of this.ruleList){
      const result = rule(file);
      if(result) return result;
    }
    throw new ClassificationError(file);
  }

  get ruleList(): readonly ClassifyRule[] {
    if(!this.rules) this.rules = this.buildRules();
    return this.rules;
  }

  /** Names listed in `src/EXECUTABLES`, the executables expected in build/bin. */
  get EXECUTABLES(): ReadonlySet<string> {
    if(!this.executables) this.executables = readExecutablesHint(this.dirs.srcDir);
    return this.executables;
  }

  private buildRules(): ClassifyRule[] {
    const d = this.dirs;
    const rules: ClassifyRule[] = [];
    if(d.jobsDir) rules.push(unitSourceRule(d.jobsDir));
    if(d.unitsDir) rules.push(unitSourceRule(d.unitsDir));
    const whitelists = d.whitelistsDir;
    if(whitelists) rules.push(f => isWithin(f, whitelists) && f.endsWith('.whitelist')
      ? { role: 'legacy-whitelist', base: whitelists, loader: 'selection-list' } : undefined);
    const data = d.dataDir;
    if(data) rules.push(f => isWithin(f, data) ? { role: 'data', base: data, loader: 'plain' } : undefined);
    const bin = d.binDir;
    if(bin) rules.push(f => isWithin(f, bin) && isExecutable(f)
      ? { role: executableRole(f), base: bin, loader: 'plain' } : undefined);
    const buildBin = d.buildBinDir;
    if(buildBin) rules.push(f => isWithin(f, buildBin) && isExecutable(f) && this.EXECUTABLES.has(path.basename(f))
      ? { role: executableRole(f), base: buildBin, loader: 'plain' } : undefined);
    const buildMo = d.buildMoDir;
    if(buildMo) rules.push(f => isWithin(f, buildMo) && path.extname(f) === '.mo'
      ? { role: 'i18n', base: buildMo, loader: 'plain' } : undefined);
    const build = d.buildDir;
    if(build) rules.push(f => isWithin(f, build) ? { role: 'build', base: build, loader: null } : undefined);
    const po = d.poDir;
    if(po) rules.push(f => path.dirname(f) === po && (['.po', '.pot'].includes(path.extname(f)) || path.basename(f) === 'POTFILES.in')
      ? { role: 'src', base: d.baseDir, loader: null } : undefined);
    const src = d.srcDir;
    if(src) rules.push(f => isWithin(f, src) ? { role: 'src', base: d.baseDir, loader: null } : undefined);
    const base = d.baseDir;
    if(base){
      rules.push(f => LEGAL_NAMES.has(path.basename(f)) ? { role: 'legal', base, loader: 'plain' } : undefined);
      rules.push(f => DOC_NAMES.has(path.basename(f)) ? { role: 'docs', base, loader: 'plain' } : undefined);
      rules.push(f => path.join(base, 'manage.py') === f ? { role: 'manage_py', base, loader: null } : undefined);
      rules.push(f => isVcsPath(f, base) ? { role: 'vcs', base, loader: null } : undefined);
    }
    // must stay last
    rules.push(f => this.isProviderPath(f) ? { role: 'unknown', base: d.baseDir, loader: null } : undefined);
    return rules;
  }

  private isProviderPath(file: string): boolean {
    return Object.values(this.dirs).some((dir): boolean => typeof dir === 'string' && isWithin(file, dir));
  }
}

function unitSourceRule(dir: string): ClassifyRule {
  return f => isWithin(f, dir) && UNIT_SOURCE_SUFFIXES.some(s => f.endsWith(s))
    ? { role: 'unit-source', base: dir, loader: 'unit-source' } : undefined;
}

function isVcsPath(file: string, base: string): boolean {
  if(VCS_FILES.has(path.basename(file))) return true;
  const rel = isWithin(file, base) ? path.relative(base, file) : file;
  return rel.split(path.sep).some(seg => VCS_DIRS.has(seg));
}

export function readExecutablesHint(srcDir: string | undefined): ReadonlySet<string> {
  if(!srcDir) return new Set();
  const hint = path.join(srcDir, 'EXECUTABLES');
  try {
    if(!fs.statSync(hint).isFile()) return new Set();
  } catch {
    return new Set();
  }
  return new Set(fs.readFileSync(hint, 'utf8').split('\n').map(l => l.trim()).filter(Boolean));
}
