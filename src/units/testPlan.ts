import { TestPlanUnit } from '../models/unit';
import { baseFields, duplicateIdIssues, durationSchema, idSchema, nonEmpty, parseDuration, patternIssues, qualifyId, read } from './common';
import { UnitInit, UnitKindDefinition } from './types';

function buildTestPlan(init: UnitInit): TestPlanUnit {
  const partialId = read(init, 'id');
  return {
    kind: 'test plan',
    ...baseFields(init),
    id: qualifyId(partialId, init.provider),
    partialId,
    name: read(init, 'name'),
    description: read(init, 'description'),
    include: read(init, 'include'),
    exclude: read(init, 'exclude'),
    estimatedDuration: parseDuration(init)
  };
}

export const testPlanKind: UnitKindDefinition<TestPlanUnit> = {
  kind: 'test plan',
  build: buildTestPlan,
  rules: [
    { field: 'id', schema: idSchema, required: true },
    { field: 'name', schema: nonEmpty, required: true },
    { field: 'estimated_duration', schema: durationSchema }
  ],
  check: (unit, lookup) => [
    ...duplicateIdIssues(unit, lookup),
    ...patternIssues(unit, 'include'),
    ...patternIssues(unit, 'exclude')
  ]
};
