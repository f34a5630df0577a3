/**
 * Artifact domain model.
 *
 * Artifacts are immutable build outputs produced by the upstream pipeline
 * and served by the artifact registry. The engine references them, never
 * mutates them: one identifier always resolves to the same bytes.
 */

/** An immutable, uniquely identified build output. */
export interface Artifact {
  /** Content digest or monotonically comparable version string (e.g., "svc:7"). */
  id: string;
  /** Source reference the artifact was built from (commit, tag). */
  source: string;
  /** When the registry first published the artifact. */
  publishedAt?: string;
}

/** Selector used to ask the registry for the newest artifact of a service. */
export interface ArtifactSelector {
  service: string;
  /** Optional release channel or tag prefix. */
  channel?: string;
}
