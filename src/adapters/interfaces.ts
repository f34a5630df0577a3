/**
 * External collaborator interfaces.
 *
 * The engine reaches the artifact registry, infrastructure controller,
 * metrics backend, verification runner and notification channel only
 * through these narrow contracts. Every method rejects on error.
 */

import { Artifact, ArtifactSelector } from '../domain/artifact';
import { ServerGroupHandle, TrafficWeights } from '../domain/server-group';
import { VerificationTestSpec } from '../domain/pipeline';

export interface ArtifactRegistry {
  /** Newest artifact for the selector, or null when none is published. */
  latest(selector: ArtifactSelector): Promise<Artifact | null>;
}

/** What the infrastructure controller is asked to run. */
export interface DeploySpec {
  service: string;
  environment: string;
  artifactId: string;
  replicas: number;
  labels: Record<string, string>;
}

export interface HealthReport {
  ready: boolean;
  detail?: string;
}

export interface InfraController {
  apply(spec: DeploySpec): Promise<ServerGroupHandle>;
  health(handle: ServerGroupHandle): Promise<HealthReport>;
  /** Replace the service's routing weights in one request. */
  setTrafficWeights(service: string, weights: TrafficWeights): Promise<void>;
  /** Weights the load balancer is actually applying. */
  getTrafficWeights(service: string): Promise<TrafficWeights>;
  destroy(handle: ServerGroupHandle): Promise<void>;
}

/** The population a metric query is scoped to. */
export interface PopulationRef {
  service: string;
  serverGroupId: string;
}

export interface TimeWindow {
  start: number;
  end: number;
}

export interface MetricsProvider {
  query(template: string, population: PopulationRef, window: TimeWindow): Promise<number[]>;
}

export interface VerificationOutcome {
  success: boolean;
  report: string;
}

export interface VerificationRunner {
  run(test: VerificationTestSpec, endpoint: string, signal?: AbortSignal): Promise<VerificationOutcome>;
}

/** Human-readable message for a terminal state or judgment gate. */
export interface NotificationMessage {
  id: string;
  event: string;
  executionId: string;
  service: string;
  artifactId: string;
  status: string;
  text: string;
  /** Reference to the execution's audit ledger entries. */
  auditRef: string;
  urgent: boolean;
  timestamp: string;
}

export interface NotificationChannel {
  send(message: NotificationMessage, channel: string): Promise<void>;
}
