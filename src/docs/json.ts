/**
 * Shared JSON artifact helpers.
 */

import { Ajv2020 as Ajv } from 'ajv/dist/2020.js';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ValidationError } from '../errors/types.js';

export interface JsonArtifactOptions {
  /** Validate the artifact against its JSON schema before returning it */
  validate?: boolean;
  /** Override the schema location (default: the bundled schema) */
  schemaPath?: string;
}

/**
 * Serialize an artifact, optionally validating it against a bundled schema
 * under `schemas/`.
 */
export function encodeArtifact(artifact: unknown, schemaFile: string, options: JsonArtifactOptions = {}): string {
  if (options.validate) {
    validateArtifact(artifact, options.schemaPath ?? resolveSchemaPath(schemaFile));
  }
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

const schemaObject = z.record(z.unknown());

function resolveSchemaPath(schemaFile: string): string {
  const url = new URL(`../../${schemaFile}`, import.meta.url);
  return fileURLToPath(url);
}

function validateArtifact(artifact: unknown, schemaPath: string): void {
  const schema = schemaObject.safeParse(JSON.parse(readFileSync(schemaPath, 'utf-8')));
  if (!schema.success) {
    throw new ValidationError(`Schema ${schemaPath} is not a JSON object`, 'schema');
  }

  const ajv = new Ajv({ allErrors: true, strict: false, formats: { 'date-time': true } });
  const validate = ajv.compile(schema.data);
  if (!validate(artifact)) {
    const errorText = ajv.errorsText(validate.errors, { separator: '\n' });
    throw new ValidationError(`Artifact schema validation failed:\n${errorText}`, 'artifact', {
      metadata: { schemaPath },
    });
  }
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}
