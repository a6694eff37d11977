import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import type { EntityType } from "./entity-type";
import type { InternalModelBuilder } from "./internal-model-builder";

/**
 * Root of the metadata graph. Entity types are keyed by name: the class name
 * for types backed by a class, an explicit string otherwise.
 */
export class Model extends Annotatable {
  builder: InternalModelBuilder | undefined;

  /** Set once finalization has run; no builder call may mutate the model after */
  isReadOnly = false;

  private readonly entityTypes = new Map<string, EntityType>();
  private readonly ignoredTypes = new Map<string, ConfigurationSource>();

  static getTypeName(type: Function | string): string {
    return typeof type === "string" ? type : type.name;
  }

  findEntityType(type: Function | string): EntityType | undefined {
    const entityType = this.entityTypes.get(Model.getTypeName(type));
    if (entityType && typeof type === "function" && entityType.clrType !== type) {
      return undefined;
    }
    return entityType;
  }

  getEntityTypes(): EntityType[] {
    return [...this.entityTypes.values()];
  }

  findIgnoredConfigurationSource(type: Function | string): ConfigurationSource | undefined {
    return this.ignoredTypes.get(Model.getTypeName(type));
  }

  /** @internal */
  addEntityType(entityType: EntityType): void {
    this.entityTypes.set(entityType.name, entityType);
  }

  /** @internal */
  removeEntityTypeEntry(entityType: EntityType): void {
    if (this.entityTypes.get(entityType.name) === entityType) {
      this.entityTypes.delete(entityType.name);
    }
  }

  /** @internal */
  addIgnored(name: string, configurationSource: ConfigurationSource): void {
    const existing = this.ignoredTypes.get(name);
    this.ignoredTypes.set(name, max(existing, configurationSource) ?? configurationSource);
  }

  /** @internal */
  removeIgnored(name: string): void {
    this.ignoredTypes.delete(name);
  }
}
