/**
 * Diagnostics sink for model building.
 *
 * Conventions report recoverable oddities here instead of throwing. Every
 * event carries a stable id so callers can filter or assert on it.
 */

import type { Logger } from "./logger";

export const ModelEventId = {
  ForeignKeyAttributesOnBothPropertiesWarning:
    "model.foreign-key-attributes-on-both-properties",
  ForeignKeyAttributesOnBothNavigationsWarning:
    "model.foreign-key-attributes-on-both-navigations",
  ConflictingForeignKeyAttributesOnNavigationAndPropertyWarning:
    "model.conflicting-foreign-key-attributes-on-navigation-and-property",
  MultipleInversePropertiesSameTargetWarning:
    "model.multiple-inverse-properties-same-target",
  NonOwnershipInverseNavigationWarning: "model.non-ownership-inverse-navigation",
  AmbiguousServicePropertyInformation: "model.ambiguous-service-property",
  EntityTypeRemovedInformation: "model.entity-type-removed",
} as const;

export type ModelEventId = (typeof ModelEventId)[keyof typeof ModelEventId];

export interface ModelDiagnostic {
  eventId: ModelEventId;
  message: string;
  data: Record<string, unknown>;
}

export interface ModelDiagnostics {
  warning(eventId: ModelEventId, message: string, data?: Record<string, unknown>): void;
  information(eventId: ModelEventId, message: string, data?: Record<string, unknown>): void;
}

/**
 * Writes diagnostics as structured pino records.
 */
export class PinoModelDiagnostics implements ModelDiagnostics {
  constructor(private readonly logger: Logger) {}

  warning(eventId: ModelEventId, message: string, data: Record<string, unknown> = {}): void {
    this.logger.warn({ eventId, ...data }, message);
  }

  information(eventId: ModelEventId, message: string, data: Record<string, unknown> = {}): void {
    this.logger.info({ eventId, ...data }, message);
  }
}

/**
 * Keeps diagnostics in memory, in the order they were reported.
 */
export class RecordingDiagnostics implements ModelDiagnostics {
  readonly warnings: ModelDiagnostic[] = [];
  readonly informations: ModelDiagnostic[] = [];

  warning(eventId: ModelEventId, message: string, data: Record<string, unknown> = {}): void {
    this.warnings.push({ eventId, message, data });
  }

  information(eventId: ModelEventId, message: string, data: Record<string, unknown> = {}): void {
    this.informations.push({ eventId, message, data });
  }
}
