import { ConfigurationSource } from "../metadata/configuration-source";
import type { EntityType } from "../metadata/entity-type";
import type { ForeignKey } from "../metadata/foreign-key";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";
import type { Key } from "../metadata/key";
import type { Property } from "../metadata/property";
import type { ColumnType, ValueGenerated } from "../types";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeBaseTypeChangedConvention,
  EntityTypePrimaryKeyChangedConvention,
  ForeignKeyAddedConvention,
  ForeignKeyPropertiesChangedConvention,
  ForeignKeyRemovedConvention,
} from "./convention-events";

const GENERATED_COLUMN_TYPES: ReadonlySet<ColumnType> = new Set<ColumnType>([
  "integer",
  "smallint",
  "bigint",
  "uuid",
]);

/**
 * Keeps `valueGenerated` in step with key structure.
 *
 * A property is generated on add when it is the single non-foreign-key
 * property of the primary key, takes part in no foreign key, and has an
 * integer (wider than one byte) or uuid column type.
 *
 * @example
 * ```typescript
 * class Invoice {
 *   @Key() @Column() id!: number;        // onAdd
 * }
 * class InvoiceLine {
 *   @Key() @Column() invoiceId!: number; // never: also a foreign key
 *   @Key() @Column() lineNo!: number;    // onAdd: the remaining key part
 * }
 * ```
 */
export class ValueGeneratorConvention
  implements
    ForeignKeyAddedConvention,
    ForeignKeyRemovedConvention,
    ForeignKeyPropertiesChangedConvention,
    EntityTypePrimaryKeyChangedConvention,
    EntityTypeBaseTypeChangedConvention
{
  static getValueGenerated(property: Property): ValueGenerated | undefined {
    if (property.isForeignKey()) {
      return undefined;
    }
    const primaryKey = property.findContainingPrimaryKey();
    if (!primaryKey || primaryKey.properties.filter((p) => !p.isForeignKey()).length !== 1) {
      return undefined;
    }
    return property.columnType !== undefined && GENERATED_COLUMN_TYPES.has(property.columnType)
      ? "onAdd"
      : undefined;
  }

  processForeignKeyAdded(
    relationshipBuilder: InternalRelationshipBuilder,
    _context: ConventionContext<InternalRelationshipBuilder>
  ): void {
    this.updateForeignKey(relationshipBuilder.metadata, relationshipBuilder.metadata.properties);
  }

  processForeignKeyRemoved(
    _entityTypeBuilder: InternalEntityTypeBuilder,
    foreignKey: ForeignKey,
    _context: ConventionContext<ForeignKey>
  ): void {
    this.updateForeignKey(foreignKey, foreignKey.properties);
  }

  processForeignKeyPropertiesChanged(
    relationshipBuilder: InternalRelationshipBuilder,
    oldDependentProperties: readonly Property[],
    _oldPrincipalKey: Key,
    _context: ConventionContext<InternalRelationshipBuilder>
  ): void {
    const foreignKey = relationshipBuilder.metadata;
    this.updateForeignKey(foreignKey, [...oldDependentProperties, ...foreignKey.properties]);
  }

  processEntityTypePrimaryKeyChanged(
    _entityTypeBuilder: InternalEntityTypeBuilder,
    newPrimaryKey: Key | undefined,
    previousPrimaryKey: Key | undefined,
    _context: ConventionContext<Key | undefined>
  ): void {
    for (const property of previousPrimaryKey?.properties ?? []) {
      if (!newPrimaryKey?.properties.includes(property)) {
        property.builder?.valueGenerated(undefined, ConfigurationSource.Convention);
      }
    }
    this.update(newPrimaryKey?.properties ?? []);
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    _newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    _context: ConventionContext<EntityType | undefined>
  ): void {
    this.update(entityTypeBuilder.metadata.getProperties());
  }

  private updateForeignKey(foreignKey: ForeignKey, properties: readonly Property[]): void {
    const primaryKey = foreignKey.declaringEntityType.findPrimaryKey();
    this.update([...properties, ...(primaryKey?.properties ?? [])]);
  }

  private update(properties: readonly Property[]): void {
    for (const property of new Set(properties)) {
      property.builder?.valueGenerated(
        ValueGeneratorConvention.getValueGenerated(property),
        ConfigurationSource.Convention
      );
    }
  }
}
