import fs from 'fs';
import path from 'path';
import Ajv, { ErrorObject } from 'ajv';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { DIRECTORY_FIELDS, providerDefinitionSchema, ProviderDefinitionDoc } from '../schemas';
import { describeError, errnoCode, LoadError, ProviderDefinitionError } from './errors';
import { logInfo, logWarn } from './logger';
import { DeclaredDirectories, Provider } from './provider';
import { ContentLoadOptions } from './unitLoaders';

export const PROVIDER_DEFINITION_SUFFIX = '.provider.json';

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDoc = ajv.compile(providerDefinitionSchema);

const PATTERN_PROBLEMS: Record<string, string> = {
  name: 'must look like RFC3720 IQN',
  version: 'must be a sequence of digits separated by dots',
  gettext_domain: 'must consist of lowercase letters, digits, "_" and "-"'
};

function problemFromAjv(err: ErrorObject): ProviderDefinitionError {
  const field = err.keyword === 'required' || err.keyword === 'additionalProperties'
    ? String(err.params.missingProperty ?? err.params.additionalProperty ?? '')
    : err.instancePath.replace(/^\//, '');
  switch(err.keyword){
    case 'required': return new ProviderDefinitionError(field, 'must be set');
    case 'additionalProperties': return new ProviderDefinitionError(field, 'unknown field');
    case 'minLength': return new ProviderDefinitionError(field, 'cannot be empty');
    case 'pattern': return new ProviderDefinitionError(field, PATTERN_PROBLEMS[field] ?? (err.message || 'wrong format'));
    default: return new ProviderDefinitionError(field || '(root)', err.message || err.keyword);
  }
}

function isDirectory(p: string): boolean {
  try { return fs.statSync(p).isDirectory(); }
  catch { return false; }
}

/**
 * Validate a parsed definition document. Throws {@link ProviderDefinitionError}
 * for the first problem; directory fields must be absolute and must exist.
 */
export function parseProviderDefinition(doc: unknown): ProviderDefinitionDoc {
  if(!validateDoc(doc)){
    const first = validateDoc.errors?.[0];
    throw first ? problemFromAjv(first) : new ProviderDefinitionError('(root)', 'invalid definition');
  }
  for(const field of DIRECTORY_FIELDS){
    const value = doc[field];
    if(value == null) continue;
    if(!path.isAbsolute(value)) throw new ProviderDefinitionError(field, 'cannot be relative');
    if(!isDirectory(value)) throw new ProviderDefinitionError(field, 'no such directory');
  }
  return doc;
}

/**
 * Directories in effect: explicit values win; otherwise the conventional
 * sub-directory of `location` is used when it exists.
 */
export function effectiveDirectories(doc: ProviderDefinitionDoc): DeclaredDirectories {
  // JSON null means the same as an absent field
  const location = doc.location ?? undefined;
  const implicit = (...parts: string[]) => {
    if(!location) return undefined;
    const dir = path.join(location, ...parts);
    return isDirectory(dir) ? dir : undefined;
  };
  return {
    baseDir: location,
    unitsDir: doc.units_dir ?? implicit('units'),
    jobsDir: doc.jobs_dir ?? implicit('jobs'),
    whitelistsDir: doc.whitelists_dir ?? implicit('whitelists'),
    dataDir: doc.data_dir ?? implicit('data'),
    binDir: doc.bin_dir ?? implicit('bin'),
    localeDir: doc.locale_dir ?? implicit('locale') ?? implicit('build', 'mo')
  };
}

/** A definition is secure when its file sits directly in one of `securePaths`. */
export function isSecureDefinition(file: string, securePaths: readonly string[]): boolean {
  const dir = path.dirname(path.resolve(file));
  return securePaths.some(p => path.resolve(p) === dir);
}

export function providerFromDefinition(doc: ProviderDefinitionDoc, secure: boolean, loaderOptions?: ContentLoadOptions): Provider {
  return new Provider({
    name: doc.name,
    version: doc.version,
    description: doc.description ?? undefined,
    gettextDomain: doc.gettext_domain ?? undefined,
    secure,
    dirs: effectiveDirectories(doc),
    loaderOptions
  });
}

/** Read, validate and instantiate one definition file. Failures come out as {@link LoadError}. */
export function loadProviderDefinition(file: string, loaderOptions?: ContentLoadOptions, securePaths: readonly string[] = getRuntimeConfig().providers.securePaths): Provider {
  let doc: ProviderDefinitionDoc;
  try {
    doc = parseProviderDefinition(JSON.parse(fs.readFileSync(file, 'utf8')));
  } catch(e){
    throw new LoadError(file, e instanceof ProviderDefinitionError ? e.message : `Cannot load '${file}': ${describeError(e)}`, e);
  }
  return providerFromDefinition(doc, isSecureDefinition(file, securePaths), loaderOptions);
}

export interface ProviderDiscovery {
  providers: Provider[];
  problems: LoadError[];
}

/**
 * Every `*.provider.json` directly inside `dirs`. Missing directories are
 * skipped; a bad definition is reported and the rest still load.
 */
export function discoverProviders(dirs: readonly string[], loaderOptions?: ContentLoadOptions, securePaths?: readonly string[]): ProviderDiscovery {
  const providers: Provider[] = [];
  const problems: LoadError[] = [];
  for(const dir of dirs){
    let names: string[];
    try {
      names = fs.readdirSync(dir).filter(n => n.endsWith(PROVIDER_DEFINITION_SUFFIX)).sort();
    } catch(e){
      if(errnoCode(e) === 'ENOENT') continue;
      throw e;
    }
    for(const name of names){
      const file = path.join(dir, name);
      try {
        providers.push(loadProviderDefinition(file, loaderOptions, securePaths));
      } catch(e){
        if(!(e instanceof LoadError)) throw e;
        logWarn('provider:definition-rejected', { file, error: e.message });
        problems.push(e);
      }
    }
  }
  logInfo('provider:discovered', { dirs, providers: providers.map(p => p.name), problems: problems.length });
  return { providers, problems };
}
