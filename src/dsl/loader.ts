/**
 * Pipeline definition loading and registration.
 *
 * Definitions are read from JSON files once at startup (or submitted over
 * the API), validated, and stored per service with a version that must
 * increase on every change.
 */

import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { EngineError, TypedError, createTypedError } from '../domain/errors';
import { PipelineDefinition } from '../domain/pipeline';
import { Logger, logger as rootLogger } from '../logger';
import { PipelineStore } from '../storage/store';
import { ValidateOptions, validatePipelineDefinition } from './validator';

function invalidDefinitionError(source: string, errors: TypedError[]): EngineError {
  return new EngineError(
    createTypedError({
      code: 'VALIDATION.SCHEMA',
      message: `Pipeline definition ${source} is invalid: ${errors.map((e) => e.message).join('; ')}`,
      retryable: false,
      details: { source, errors },
    }),
  );
}

/** Validate a raw document, throwing VALIDATION.SCHEMA with every error found. */
export function parsePipelineDefinition(raw: unknown, source: string, options?: ValidateOptions): PipelineDefinition {
  const result = validatePipelineDefinition(raw, options);
  if (!result.valid || !result.definition) {
    throw invalidDefinitionError(source, result.errors);
  }
  return result.definition;
}

/** Read and validate one definition file. */
export async function loadPipelineDefinition(filePath: string): Promise<PipelineDefinition> {
  const text = await readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new EngineError(
      createTypedError({
        code: 'VALIDATION.PARSE',
        message: `Pipeline definition ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        retryable: false,
        details: { source: filePath },
      }),
    );
  }
  return parsePipelineDefinition(raw, filePath);
}

/** Read every *.json definition in a directory, in file name order. */
export async function loadPipelineDirectory(dir: string): Promise<PipelineDefinition[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();
  const definitions: PipelineDefinition[] = [];
  for (const file of files) {
    definitions.push(await loadPipelineDefinition(join(dir, file)));
  }
  return definitions;
}

/**
 * Store a definition as the service's newest version. Re-registering the
 * current version is accepted only when nothing but createdAt differs.
 */
export async function registerPipeline(
  store: PipelineStore,
  definition: PipelineDefinition,
  log: Logger = rootLogger,
): Promise<PipelineDefinition> {
  const latest = await store.getLatest(definition.service);
  if (latest && definition.version <= latest.version) {
    const same =
      definition.version === latest.version &&
      JSON.stringify({ ...definition, createdAt: '' }) === JSON.stringify({ ...latest, createdAt: '' });
    if (same) return latest;
    throw new EngineError(
      createTypedError({
        code: 'PIPELINE.VERSION_CONFLICT',
        message: `Pipeline for "${definition.service}" is already at version ${latest.version}`,
        retryable: false,
        details: { service: definition.service, latestVersion: latest.version, version: definition.version },
        suggestedFixes: [{ type: 'BUMP_VERSION', params: { version: latest.version + 1 } }],
      }),
    );
  }
  const stored = await store.put(definition);
  log.info('Pipeline registered', { service: stored.service, version: stored.version });
  return stored;
}
