import { z } from 'zod';
import { fieldOrigin } from '../models/record';
import { JobUnit } from '../models/unit';
import { baseFields, duplicateIdIssues, durationSchema, idSchema, parseDuration, qualifyId, read } from './common';
import { UnitInit, UnitIssue, UnitKindDefinition, UnitLookup } from './types';

export const JOB_PLUGINS = [
  'shell', 'manual', 'user-interact', 'user-verify', 'user-interact-verify', 'attachment', 'resource', 'local', 'qml'
] as const;

function buildJob(init: UnitInit): JobUnit {
  const partialId = read(init, 'id');
  return {
    kind: 'job',
    ...baseFields(init),
    id: qualifyId(partialId, init.provider),
    partialId,
    summary: read(init, 'summary'),
    plugin: read(init, 'plugin'),
    command: read(init, 'command'),
    description: read(init, 'description'),
    categoryId: qualifyId(read(init, 'category_id'), init.provider),
    estimatedDuration: parseDuration(init),
    depends: read(init, 'depends'),
    requires: read(init, 'requires'),
    user: read(init, 'user'),
    flags: (read(init, 'flags') ?? '').split(/[\s,]+/).filter(Boolean)
  };
}

function checkJob(unit: JobUnit, lookup?: UnitLookup): UnitIssue[] {
  const issues = duplicateIdIssues(unit, lookup);
  if(lookup && unit.categoryId !== undefined){
    const found = lookup.unitsWithId(unit.categoryId).some(u => u.kind === 'category');
    if(!found){
      issues.push({ severity: 'error', field: 'category_id', message: `unknown category '${unit.categoryId}'`, origin: fieldOrigin(unit, 'category_id') });
    }
  }
  if(unit.summary === undefined && unit.partialId !== undefined){
    issues.push({ severity: 'advice', field: 'summary', message: 'jobs should have a summary', origin: unit.origin });
  }
  return issues;
}

const runsCommand = (u: JobUnit) => u.plugin !== 'manual';

export const jobKind: UnitKindDefinition<JobUnit> = {
  kind: 'job',
  build: buildJob,
  rules: [
    { field: 'id', schema: idSchema, required: true },
    { field: 'plugin', schema: z.enum(JOB_PLUGINS), required: true },
    { field: 'summary', schema: z.string().max(80, 'should fit in 80 characters') },
    { field: 'command', required: runsCommand, useless: u => !runsCommand(u) },
    { field: 'description', required: u => u.plugin === 'manual' },
    { field: 'estimated_duration', schema: durationSchema },
    { field: 'user', schema: z.literal('root') },
    { field: 'category_id', schema: idSchema },
    { field: 'name', deprecated: true }
  ],
  check: checkJob
};
