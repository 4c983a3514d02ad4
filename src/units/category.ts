import { CategoryUnit } from '../models/unit';
import { baseFields, duplicateIdIssues, idSchema, nonEmpty, qualifyId, read } from './common';
import { UnitInit, UnitKindDefinition } from './types';

// Categories group jobs under a human readable name; jobs point at one with
// their category_id field.
export const categoryKind: UnitKindDefinition<CategoryUnit> = {
  kind: 'category',
  build(init: UnitInit): CategoryUnit {
    const partialId = read(init, 'id');
    return {
      kind: 'category',
      ...baseFields(init),
      id: qualifyId(partialId, init.provider),
      partialId,
      name: read(init, 'name')
    };
  },
  rules: [
    { field: 'id', schema: idSchema, required: true },
    { field: 'name', schema: nonEmpty, required: true }
  ],
  check: (unit, lookup) => duplicateIdIssues(unit, lookup)
};
