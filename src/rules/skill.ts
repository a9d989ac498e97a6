import type { Document, SchemaRule } from '../types';
import { nonEmptyString } from './helpers';

const REQUIRED_FIELDS = ['name', 'description'] as const;
const NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
const MAX_NAME_LENGTH = 64;
const MAX_DESCRIPTION_LENGTH = 1024;

function missingFields(doc: Document): string[] {
  return REQUIRED_FIELDS.filter((f) => nonEmptyString(doc.metadata, f) === null);
}

export const skillRules: SchemaRule[] = [
  {
    id: 'skill/required-metadata',
    appliesTo: 'skill',
    severity: 'error',
    description: 'front matter declares non-empty `name` and `description`',
    predicate: (doc) => missingFields(doc).length === 0,
    explain: (doc) =>
      `missing or empty front matter field: ${missingFields(doc).join(', ')}`,
  },
  {
    // absent names are reported by skill/required-metadata
    id: 'skill/name-format',
    appliesTo: 'skill',
    severity: 'warning',
    description: `\`name\` is kebab-case and at most ${MAX_NAME_LENGTH} characters`,
    predicate: (doc) => {
      const name = nonEmptyString(doc.metadata, 'name');
      return (
        name === null ||
        (NAME_PATTERN.test(name) && name.length <= MAX_NAME_LENGTH)
      );
    },
    explain: (doc) =>
      `name "${nonEmptyString(doc.metadata, 'name') ?? ''}" should be kebab-case and at most ${MAX_NAME_LENGTH} characters`,
  },
  {
    id: 'skill/description-length',
    appliesTo: 'skill',
    severity: 'warning',
    description: `\`description\` is at most ${MAX_DESCRIPTION_LENGTH} characters`,
    predicate: (doc) => {
      const description = nonEmptyString(doc.metadata, 'description');
      return description === null || description.length <= MAX_DESCRIPTION_LENGTH;
    },
    explain: (doc) =>
      `description is ${
        nonEmptyString(doc.metadata, 'description')?.length ?? 0
      } characters; the limit is ${MAX_DESCRIPTION_LENGTH}`,
  },
];
