#!/usr/bin/env node

import { promises as fs } from 'fs';
import path from 'path';
import { buildConfigJsonSchema } from '../src/schemas/config-json-schema.js';
import { CONFIG } from '../src/constants/config-constants.js';
import { TEXT } from '../src/constants/text-constants.js';
import { writeError, writeInfo } from '../src/utils/logging.js';
import { sanitizeError } from '../src/utils/security.js';

async function generateJsonSchema(): Promise<void> {
  try {
    const outputPath = path.join(process.cwd(), CONFIG.JSON_SCHEMA_FILENAME);
    await fs.writeFile(
      outputPath,
      JSON.stringify(buildConfigJsonSchema(), null, CONFIG.JSON_INDENT_SIZE),
      CONFIG.DEFAULT_ENCODING
    );

    writeInfo(`${TEXT.SCHEMA_GENERATION_SUCCESS}: ${outputPath}`);
  } catch (error) {
    writeError(TEXT.SCHEMA_GENERATION_FAILED, {
      level: CONFIG.LOG_LEVEL_ERROR,
      error: sanitizeError(error)
    });
    process.exit(CONFIG.EXIT_CODE_ERROR);
  }
}

// Run if executed directly
if (import.meta.url === `${CONFIG.FILE_URL_SCHEME}${process.argv[1]}`) {
  await generateJsonSchema();
}

export { generateJsonSchema };
