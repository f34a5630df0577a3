/**
 * Pipeline definition schema versioning.
 *
 * A definition may declare the schema version it was written against;
 * definitions that declare none are read as the current version.
 */

/** Supported pipeline definition schema versions. */
export const PIPELINE_SCHEMA_VERSIONS = ['1.0.0'] as const;
export type PipelineSchemaVersion = (typeof PIPELINE_SCHEMA_VERSIONS)[number];

/** The current default schema version. */
export const CURRENT_SCHEMA_VERSION: PipelineSchemaVersion = '1.0.0';

/** Check if a version string is a supported schema version. */
export function isSupportedVersion(version: string): version is PipelineSchemaVersion {
  return PIPELINE_SCHEMA_VERSIONS.some((v) => v === version);
}
