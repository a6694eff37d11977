import { ConfigurationSource, overrides } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import { ModelEventId } from "../diagnostics";
import type { ModelDiagnostics } from "../diagnostics";
import type { ConventionContext } from "./convention-context";
import type { ModelFinalizedConvention } from "./convention-events";

/**
 * Finalization pass that prunes the model.
 *
 * 1. Entity types not reachable through navigations (or base types) from a
 *    type configured at DataAnnotation or above are removed.
 * 2. Foreign keys left with no navigation on either side are removed.
 */
export class ModelCleanupConvention implements ModelFinalizedConvention {
  constructor(private readonly diagnostics: ModelDiagnostics) {}

  processModelFinalized(
    modelBuilder: InternalModelBuilder,
    context: ConventionContext<InternalModelBuilder>
  ): void {
    this.removeUnreachableEntityTypes(modelBuilder, context);
    this.removeNavigationlessForeignKeys(modelBuilder);
  }

  private removeUnreachableEntityTypes(
    modelBuilder: InternalModelBuilder,
    context: ConventionContext<InternalModelBuilder>
  ): void {
    const entityTypes = modelBuilder.metadata.getEntityTypes();
    const reached = new Set<EntityType>(
      entityTypes.filter((t) => overrides(t.configurationSource, ConfigurationSource.DataAnnotation))
    );

    const queue = [...reached];
    for (let current = queue.shift(); current; current = queue.shift()) {
      const neighbours = current.getNavigations().map((n) => n.targetEntityType);
      if (current.baseType) {
        neighbours.push(current.baseType);
      }
      for (const neighbour of neighbours) {
        if (!reached.has(neighbour)) {
          reached.add(neighbour);
          queue.push(neighbour);
        }
      }
    }

    const orphans = entityTypes
      .filter((t) => !reached.has(t))
      .sort((a, b) => b.getTypesInHierarchyUp().length - a.getTypesInHierarchyUp().length);
    if (orphans.length === 0) {
      return;
    }

    context.delayConventions(() => {
      for (const orphan of orphans) {
        if (!orphan.isInModel) {
          continue;
        }
        if (modelBuilder.hasNoEntityType(orphan, ConfigurationSource.DataAnnotation)) {
          this.diagnostics.information(
            ModelEventId.EntityTypeRemovedInformation,
            `Entity type '${orphan.displayName()}' is not reachable through any navigation and was removed from the model.`,
            { entityType: orphan.name }
          );
        }
      }
    });
  }

  private removeNavigationlessForeignKeys(modelBuilder: InternalModelBuilder): void {
    for (const entityType of modelBuilder.metadata.getEntityTypes()) {
      for (const foreignKey of entityType.getDeclaredForeignKeys()) {
        if (!foreignKey.dependentToPrincipal && !foreignKey.principalToDependent) {
          entityType.builder?.hasNoRelationship(foreignKey, ConfigurationSource.DataAnnotation);
        }
      }
    }
  }
}
