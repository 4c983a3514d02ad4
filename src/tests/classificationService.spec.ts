import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ContentClassifier, isWithin, readExecutablesHint } from '../services/classificationService';
import { ClassificationError } from '../services/errors';
import { deriveDirectories } from '../services/provider';

function write(file: string, text: string, mode?: number){
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text);
  if(mode !== undefined) fs.chmodSync(file, mode);
}

describe('isWithin', () => {
  it('compares whole path segments', () => {
    expect(isWithin('/p/jobs/a.pxu', '/p/jobs')).toBe(true);
    expect(isWithin('/p/jobs/deep/a.pxu', '/p/jobs')).toBe(true);
    expect(isWithin('/p/jobsx/a.pxu', '/p/jobs')).toBe(false);
    expect(isWithin('/p/jobs', '/p/jobs')).toBe(false);
    expect(isWithin('/q/a.pxu', '/p')).toBe(false);
  });
});

describe('ContentClassifier', () => {
  let base: string;
  let classifier: ContentClassifier;
  const at = (...parts: string[]) => path.join(base, ...parts);

  beforeAll(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'pcl-classify-'));
    write(at('bin', 'run-me'), '#!/bin/sh\nexit 0\n', 0o755);
    write(at('bin', 'tool'), '\u007fELF', 0o755);
    write(at('bin', 'notes'), 'plain text', 0o644);
    write(at('build', 'bin', 'listed'), '\u007fELF', 0o755);
    write(at('build', 'bin', 'stray'), '\u007fELF', 0o755);
    write(at('src', 'EXECUTABLES'), 'listed\n\n');
    const dirs = deriveDirectories({
      baseDir: base,
      jobsDir: at('jobs'),
      unitsDir: at('units'),
      whitelistsDir: at('whitelists'),
      dataDir: at('data'),
      binDir: at('bin')
    });
    classifier = new ContentClassifier(dirs);
  });

  afterAll(() => { fs.rmSync(base, { recursive: true, force: true }); });

  it('loads unit definitions from the jobs and units directories', () => {
    expect(classifier.classify(at('jobs', 'a.txt'))).toEqual({ role: 'unit-source', base: at('jobs'), loader: 'unit-source' });
    expect(classifier.classify(at('jobs', 'b.txt.in'))).toEqual({ role: 'unit-source', base: at('jobs'), loader: 'unit-source' });
    expect(classifier.classify(at('units', 'c.pxu'))).toEqual({ role: 'unit-source', base: at('units'), loader: 'unit-source' });
  });

  it('treats other files in the units directory as unknown', () => {
    expect(classifier.classify(at('units', 'notes.md'))).toEqual({ role: 'unknown', base, loader: null });
  });

  it('recognizes legacy whitelists', () => {
    expect(classifier.classify(at('whitelists', 'default.whitelist')))
      .toEqual({ role: 'legacy-whitelist', base: at('whitelists'), loader: 'selection-list' });
  });

  it('lets the data directory shadow documentation names', () => {
    expect(classifier.classify(at('data', 'README'))).toEqual({ role: 'data', base: at('data'), loader: 'plain' });
  });

  it('tells scripts from binaries by their first bytes', () => {
    expect(classifier.classify(at('bin', 'run-me'))).toEqual({ role: 'script', base: at('bin'), loader: 'plain' });
    expect(classifier.classify(at('bin', 'tool'))).toEqual({ role: 'binary', base: at('bin'), loader: 'plain' });
  });

  it('does not treat non-executable files in bin as executables', () => {
    expect(classifier.classify(at('bin', 'notes'))).toEqual({ role: 'unknown', base, loader: null });
  });

  it('takes only the listed executables from build/bin', () => {
    expect(classifier.EXECUTABLES).toEqual(new Set(['listed']));
    expect(classifier.classify(at('build', 'bin', 'listed'))).toEqual({ role: 'binary', base: at('build', 'bin'), loader: 'plain' });
    expect(classifier.classify(at('build', 'bin', 'stray'))).toEqual({ role: 'build', base: at('build'), loader: null });
  });

  it('relocates compiled catalogs relative to build/mo', () => {
    expect(classifier.classify(at('build', 'mo', 'fr', 'LC_MESSAGES', 'x.mo')))
      .toEqual({ role: 'i18n', base: at('build', 'mo'), loader: 'plain' });
    expect(classifier.classify(at('build', 'obj.o'))).toEqual({ role: 'build', base: at('build'), loader: null });
  });

  it('acknowledges translation sources and sources without loading them', () => {
    expect(classifier.classify(at('po', 'fr.po'))).toEqual({ role: 'src', base, loader: null });
    expect(classifier.classify(at('po', 'POTFILES.in'))).toEqual({ role: 'src', base, loader: null });
    expect(classifier.classify(at('src', 'main.c'))).toEqual({ role: 'src', base, loader: null });
  });

  it('recognizes files by name in the base directory', () => {
    expect(classifier.classify(at('COPYING'))).toEqual({ role: 'legal', base, loader: 'plain' });
    expect(classifier.classify(at('README.md'))).toEqual({ role: 'docs', base, loader: 'plain' });
    expect(classifier.classify(at('manage.py'))).toEqual({ role: 'manage_py', base, loader: null });
    expect(classifier.classify(at('.gitignore'))).toEqual({ role: 'vcs', base, loader: null });
    expect(classifier.classify(at('.git', 'config'))).toEqual({ role: 'vcs', base, loader: null });
  });

  it('falls back to unknown inside the provider', () => {
    expect(classifier.classify(at('other.cfg'))).toEqual({ role: 'unknown', base, loader: null });
  });

  it('refuses paths that belong to no provider directory', () => {
    const stray = path.join(path.parse(base).root, 'nonexistent-provider-root', 'x.cfg');
    expect(() => classifier.classify(stray)).toThrow(ClassificationError);
    expect(() => classifier.classify(stray)).toThrow(`Unable to classify: '${stray}'`);
  });

  it('is deterministic', () => {
    const file = at('jobs', 'a.txt');
    expect(classifier.classify(file)).toEqual(classifier.classify(file));
  });
});

describe('readExecutablesHint', () => {
  it('is empty without a source directory or hint file', () => {
    expect(readExecutablesHint(undefined).size).toBe(0);
    expect(readExecutablesHint(path.join(os.tmpdir(), 'pcl-no-such-src')).size).toBe(0);
  });
});
