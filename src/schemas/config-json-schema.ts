import { createHash } from 'crypto';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CONFIG } from '../constants/config-constants.js';
import { TEXT } from '../constants/text-constants.js';
import { SecretsWatchConfigSchema } from './config.schema.js';

/**
 * Deterministic schema ID: prefix:version:hash:filename. It depends on
 * nothing but constants, so regenerating the schema never changes it.
 */
export function generateSchemaId(): string {
  const components = [
    CONFIG.JSON_SCHEMA_ID_PREFIX,
    CONFIG.JSON_SCHEMA_VERSION,
    CONFIG.JSON_SCHEMA_FILENAME
  ];

  const hash = createHash('sha256')
    .update(components.join(':'))
    .digest('hex')
    .substring(0, 8);

  return `${CONFIG.JSON_SCHEMA_ID_PREFIX}:${CONFIG.JSON_SCHEMA_VERSION}:${hash}:${CONFIG.JSON_SCHEMA_FILENAME}`;
}

export function buildConfigJsonSchema(): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(SecretsWatchConfigSchema, {
    name: CONFIG.JSON_SCHEMA_NAME,
    $refStrategy: 'none',
    errorMessages: true,
    markdownDescription: true
  });

  return {
    $schema: CONFIG.JSON_SCHEMA_DRAFT,
    $id: generateSchemaId(),
    title: TEXT.SCHEMA_TITLE,
    description: TEXT.SCHEMA_DESCRIPTION,
    ...jsonSchema
  };
}
