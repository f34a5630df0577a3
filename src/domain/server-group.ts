/**
 * ServerGroup domain model.
 *
 * A ServerGroup is a concrete running population of one artifact under one
 * service. Roles are transitioned only by the cutover controller; at most
 * one group per service holds ACTIVE at any instant.
 */

/** Traffic-serving role of a server group. */
export enum ServerGroupRole {
  Active = 'ACTIVE',
  Candidate = 'CANDIDATE',
  Canary = 'CANARY',
  Disabled = 'DISABLED',
}

/** Infrastructure-side handle of an applied deployment. */
export interface ServerGroupHandle {
  id: string;
  /** Base URL the group serves on; verification jobs target it. */
  endpoint: string;
}

/** A running population of one artifact for one service. */
export interface ServerGroup {
  id: string;
  service: string;
  artifactId: string;
  /** Execution that created this group. */
  executionId: string;
  environment: string;
  role: ServerGroupRole;
  handle: ServerGroupHandle;
  createdAt: string;
  updatedAt: string;
  destroyedAt?: string;
}

/**
 * Traffic weights for one service, keyed by server group ID.
 * Weights are percentages; an applied map always sums to 100.
 */
export type TrafficWeights = Record<string, number>;

/** A point-in-time view of which group serves a service and at what weights. */
export interface TrafficSnapshot {
  activeServerGroupId: string | null;
  weights: TrafficWeights;
}

/** One role change in a role reassignment. */
export interface RoleChange {
  serverGroupId: string;
  role: ServerGroupRole;
}

/** Compare two weight maps, treating absent and zero entries alike. */
export function weightsEqual(a: TrafficWeights, b: TrafficWeights): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if ((a[key] ?? 0) !== (b[key] ?? 0)) return false;
  }
  return true;
}
