#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod output-line schema
 *
 * Consumers of the JSON Lines corpus can validate records without this
 * package by using the generated schema.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { IssueRecordLineSchema } from '../src/core/normalizer/Normalizer';
import { errorMessage } from '../src/utils/errors';

const OUTPUT_PATH = path.join(__dirname, '../src/core/normalizer/schema.json');

function generateSchema(): void {
  console.log('Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(IssueRecordLineSchema, {
    $refStrategy: 'none',
    target: 'jsonSchema7',
    errorMessages: true,
  });

  const schemaWithMetadata = {
    ...jsonSchema,
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'IssueRecordLine',
    description: 'One line of a <project>_issues.jsonl training corpus file',
    version: '1.0.0',
    examples: [
      {
        issue_id: 'DEMO-42',
        project: 'DEMO',
        title: 'Crash when the cache directory is missing',
        description: 'Starting the broker without a cache directory throws on boot.',
        status: 'Resolved',
        priority: 'Major',
        issue_type: 'Bug',
        reporter: 'Ada Example',
        assignee: null,
        created_date: '2023-04-01T10:00:00.000+0000',
        updated_date: '2023-04-03T08:15:00.000+0000',
        resolved_date: '2023-04-03T08:15:00.000+0000',
        labels: ['startup'],
        components: ['broker'],
        comments: [
          { author: 'Sam Example', created: '2023-04-02T09:00:00.000+0000', body: 'Reproduced on main.' },
        ],
        training_task: 'classification',
      },
    ],
  };

  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`JSON Schema generated: ${OUTPUT_PATH}`);
  console.log(`Fields: ${Object.keys(IssueRecordLineSchema.shape).join(', ')}`);
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('Failed to generate JSON Schema:', errorMessage(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
