import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  discoverProviders, effectiveDirectories, isSecureDefinition,
  loadProviderDefinition, parseProviderDefinition
} from '../services/providerDefinition';
import { LoadError, ProviderDefinitionError } from '../services/errors';
import type { ContentLoadOptions } from '../services/unitLoaders';

const NAME = '2013.com.example:test';

function problemOf(doc: unknown): string | undefined {
  try {
    parseProviderDefinition(doc);
    return undefined;
  } catch(e){
    if(e instanceof ProviderDefinitionError) return e.message;
    throw e;
  }
}

describe('parseProviderDefinition', () => {
  it('accepts a minimal definition', () => {
    expect(parseProviderDefinition({ name: NAME, version: '1.0' })).toEqual({ name: NAME, version: '1.0' });
  });

  it('requires name and version', () => {
    expect(problemOf({ name: NAME })).toBe("Problem in provider definition, field 'version': must be set");
    expect(problemOf({ version: '1' })).toBe("Problem in provider definition, field 'name': must be set");
  });

  it('checks the shape of name, version and gettext domain', () => {
    expect(problemOf({ name: 'Example', version: '1.0' })).toBe("Problem in provider definition, field 'name': must look like RFC3720 IQN");
    expect(problemOf({ name: NAME, version: 'one' })).toBe("Problem in provider definition, field 'version': must be a sequence of digits separated by dots");
    expect(problemOf({ name: NAME, version: '1', gettext_domain: 'Bad Domain' }))
      .toBe(`Problem in provider definition, field 'gettext_domain': must consist of lowercase letters, digits, "_" and "-"`);
  });

  it('rejects unknown fields', () => {
    expect(problemOf({ name: NAME, version: '1', colour: 'blue' })).toBe("Problem in provider definition, field 'colour': unknown field");
  });

  it('requires absolute, existing directories', () => {
    expect(problemOf({ name: NAME, version: '1', location: 'relative/dir' })).toBe("Problem in provider definition, field 'location': cannot be relative");
    const missing = path.join(os.tmpdir(), 'pcl-no-such-dir', 'units');
    expect(problemOf({ name: NAME, version: '1', units_dir: missing })).toBe("Problem in provider definition, field 'units_dir': no such directory");
  });
});

describe('provider definition files', () => {
  let root: string;
  const at = (...parts: string[]) => path.join(root, ...parts);

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pcl-def-'));
  });

  afterEach(() => { fs.rmSync(root, { recursive: true, force: true }); });

  it('uses conventional sub-directories of the location that exist', () => {
    fs.mkdirSync(at('units'));
    fs.mkdirSync(at('whitelists'));
    fs.mkdirSync(at('build', 'mo'), { recursive: true });
    fs.mkdirSync(at('elsewhere'));
    const dirs = effectiveDirectories({ name: NAME, version: '1', location: root, data_dir: at('elsewhere') });
    expect(dirs).toEqual({
      baseDir: root,
      unitsDir: at('units'),
      jobsDir: undefined,
      whitelistsDir: at('whitelists'),
      dataDir: at('elsewhere'),
      binDir: undefined,
      localeDir: at('build', 'mo')
    });
  });

  it('loads a definition into a provider', () => {
    fs.mkdirSync(at('units'));
    const file = at('test.provider.json');
    fs.writeFileSync(file, JSON.stringify({ name: NAME, version: '1.2', description: 'Test provider', location: root }));
    const options: ContentLoadOptions = { validate: false, validation: {}, check: false };
    const provider = loadProviderDefinition(file, options, []);
    expect([provider.name, provider.version, provider.description, provider.secure]).toEqual([NAME, '1.2', 'Test provider', false]);
    expect(provider.unitsDir).toBe(at('units'));
    expect(provider.loaderOptions).toBe(options);
    expect(loadProviderDefinition(file, undefined, [root]).secure).toBe(true);
  });

  it('treats null fields as absent', () => {
    const file = at('nulls.provider.json');
    fs.writeFileSync(file, JSON.stringify({ name: NAME, version: '1', description: null, gettext_domain: null, location: null, units_dir: null }));
    const provider = loadProviderDefinition(file, undefined, []);
    expect(provider.description).toBeUndefined();
    expect(provider.gettextDomain).toBeUndefined();
    expect(provider.baseDir).toBeUndefined();
    expect(provider.unitsDir).toBeUndefined();
  });

  it('reports unreadable definitions as load errors', () => {
    const file = at('broken.provider.json');
    fs.writeFileSync(file, '{ not json');
    let caught: unknown;
    try { loadProviderDefinition(file, undefined, []); } catch(e){ caught = e; }
    expect(caught).toBeInstanceOf(LoadError);
    expect(caught instanceof LoadError && caught.file).toBe(file);
    expect(caught instanceof LoadError && caught.message.startsWith(`Cannot load '${file}': `)).toBe(true);
  });

  it('discovers providers and keeps going past bad definitions', () => {
    fs.writeFileSync(at('b.provider.json'), JSON.stringify({ name: 'Bad', version: '1' }));
    fs.writeFileSync(at('a.provider.json'), JSON.stringify({ name: NAME, version: '1' }));
    fs.writeFileSync(at('notes.txt'), 'ignored');
    const { providers, problems } = discoverProviders([at('missing'), root], undefined, []);
    expect(providers.map(p => p.name)).toEqual([NAME]);
    expect(problems.map(p => [p.file, p.message])).toEqual([
      [at('b.provider.json'), "Problem in provider definition, field 'name': must look like RFC3720 IQN"]
    ]);
  });
});

describe('isSecureDefinition', () => {
  it('accepts files directly inside a secure directory only', () => {
    expect(isSecureDefinition('/usr/share/pcl-providers-1/a.provider.json', ['/usr/share/pcl-providers-1'])).toBe(true);
    expect(isSecureDefinition('/usr/share/pcl-providers-1/sub/a.provider.json', ['/usr/share/pcl-providers-1'])).toBe(false);
    expect(isSecureDefinition('/home/u/a.provider.json', ['/usr/share/pcl-providers-1'])).toBe(false);
  });
});
