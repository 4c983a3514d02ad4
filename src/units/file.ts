import { FileUnit, isFileRole } from '../models/unit';
import { UnitDefinitionError } from '../services/errors';
import { baseFields, nonEmpty, read } from './common';
import { UnitInit, UnitKindDefinition } from './types';

/** File provenance: which provider file a set of units came from. */
export const fileKind: UnitKindDefinition<FileUnit> = {
  kind: 'file',
  build(init: UnitInit): FileUnit {
    const role = read(init, 'role') ?? 'unknown';
    if(!isFileRole(role)) throw new UnitDefinitionError('role', `field role: '${role}' is not a known file role`);
    return {
      kind: 'file',
      ...baseFields(init),
      path: read(init, 'path'),
      role,
      base: read(init, 'base')
    };
  },
  rules: [
    { field: 'path', schema: nonEmpty, required: true }
  ],
  check: () => []
};
