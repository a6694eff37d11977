import { Annotatable } from "./annotatable";
import { ConfigurationSource, max } from "./configuration-source";
import type { EntityType } from "./entity-type";
import type { ForeignKey } from "./foreign-key";
import type { Property } from "./property";
import type { InternalKeyBuilder } from "./internal-key-builder";

export class Key extends Annotatable {
  builder: InternalKeyBuilder | undefined;

  readonly referencingForeignKeys = new Set<ForeignKey>();

  constructor(
    readonly properties: readonly Property[],
    readonly declaringEntityType: EntityType,
    public configurationSource: ConfigurationSource
  ) {
    super();
  }

  get isInModel(): boolean {
    return this.builder !== undefined;
  }

  isPrimaryKey(): boolean {
    return this.declaringEntityType.primaryKey === this;
  }

  updateConfigurationSource(configurationSource: ConfigurationSource): void {
    this.configurationSource = max(this.configurationSource, configurationSource) ?? configurationSource;
  }

  toString(): string {
    return `{${this.properties.map((p) => `'${p.name}'`).join(", ")}}`;
  }
}

export function sameProperties(
  left: readonly Property[],
  right: readonly Property[]
): boolean {
  return left.length === right.length && left.every((p, i) => p === right[i]);
}

export function formatProperties(properties: readonly { name: string }[]): string {
  return `{${properties.map((p) => `'${p.name}'`).join(", ")}}`;
}
