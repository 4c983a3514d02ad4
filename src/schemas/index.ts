// JSON Schemas for on-disk documents. Field names follow the file format, not
// the TypeScript naming used elsewhere.
import type { JSONSchemaType } from 'ajv';

/** Contents of a `*.provider.json` definition file. Optional fields may also be `null`. */
export interface ProviderDefinitionDoc {
  name: string;
  version: string;
  description?: string | null;
  gettext_domain?: string | null;
  location?: string | null;
  units_dir?: string | null;
  jobs_dir?: string | null;
  whitelists_dir?: string | null;
  data_dir?: string | null;
  bin_dir?: string | null;
  locale_dir?: string | null;
}

export const PROVIDER_NAME_PATTERN = '^[0-9]{4}\\.[a-z][a-z0-9-]*(\\.[a-z][a-z0-9-]*)+:[a-z][a-z0-9-]*$';
export const PROVIDER_VERSION_PATTERN = '^[0-9]+(\\.[0-9]+)*$';
export const GETTEXT_DOMAIN_PATTERN = '^[a-z0-9_-]+$';

const directory = { type: 'string', minLength: 1, nullable: true } as const;

export const DIRECTORY_FIELDS = ['location', 'units_dir', 'jobs_dir', 'whitelists_dir', 'data_dir', 'bin_dir', 'locale_dir'] as const;

export const providerDefinitionSchema: JSONSchemaType<ProviderDefinitionDoc> = {
  type: 'object',
  additionalProperties: false,
  required: ['name', 'version'],
  properties: {
    name: { type: 'string', minLength: 1, pattern: PROVIDER_NAME_PATTERN },
    version: { type: 'string', minLength: 1, pattern: PROVIDER_VERSION_PATTERN },
    description: { type: 'string', nullable: true },
    gettext_domain: { type: 'string', nullable: true, pattern: GETTEXT_DOMAIN_PATTERN },
    location: directory,
    units_dir: directory,
    jobs_dir: directory,
    whitelists_dir: directory,
    data_dir: directory,
    bin_dir: directory,
    locale_dir: directory
  }
};
