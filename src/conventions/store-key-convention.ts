import { ConfigurationSource } from "../metadata/configuration-source";
import type { Annotation } from "../metadata/annotatable";
import type { EntityType } from "../metadata/entity-type";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";
import { AnnotationNames } from "../types";
import type { ConventionContext } from "./convention-context";
import type {
  EntityTypeAddedConvention,
  EntityTypeAnnotationChangedConvention,
  EntityTypeBaseTypeChangedConvention,
  ForeignKeyOwnershipChangedConvention,
} from "./convention-events";

export const ID_PROPERTY_NAME = "id";
export const RAW_DOCUMENT_PROPERTY_NAME = "__jObject";
export const DOCUMENT_ID_GENERATOR = "document-id";

/**
 * Gives every document root a string `id` key and a shadow property holding
 * the raw stored document. Types that stop being roots lose both.
 */
export class StoreKeyConvention
  implements
    EntityTypeAddedConvention,
    ForeignKeyOwnershipChangedConvention,
    EntityTypeAnnotationChangedConvention,
    EntityTypeBaseTypeChangedConvention
{
  processEntityTypeAdded(
    entityTypeBuilder: InternalEntityTypeBuilder,
    context: ConventionContext<InternalEntityTypeBuilder>
  ): void {
    this.process(entityTypeBuilder, context);
  }

  processForeignKeyOwnershipChanged(
    relationshipBuilder: InternalRelationshipBuilder,
    context: ConventionContext<InternalRelationshipBuilder>
  ): void {
    const builder = relationshipBuilder.metadata.declaringEntityType.builder;
    if (builder) {
      this.process(builder, context);
    }
  }

  processEntityTypeAnnotationChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    name: string,
    _annotation: Annotation | undefined,
    _oldAnnotation: Annotation | undefined,
    context: ConventionContext<Annotation | undefined>
  ): void {
    if (name === AnnotationNames.ContainerName) {
      this.process(entityTypeBuilder, context);
    }
  }

  processEntityTypeBaseTypeChanged(
    entityTypeBuilder: InternalEntityTypeBuilder,
    newBaseType: EntityType | undefined,
    _oldBaseType: EntityType | undefined,
    context: ConventionContext<EntityType | undefined>
  ): void {
    if (entityTypeBuilder.metadata.baseType === newBaseType) {
      this.process(entityTypeBuilder, context);
    }
  }

  private process(entityTypeBuilder: InternalEntityTypeBuilder, context: ConventionContext<unknown>): void {
    const entityType = entityTypeBuilder.metadata;
    if (!entityType.baseType && entityType.isDocumentRoot() && !entityType.isKeyless) {
      const idProperty =
        entityType.findProperty(ID_PROPERTY_NAME)?.builder ??
        entityTypeBuilder.property(ID_PROPERTY_NAME, String, ConfigurationSource.Convention);
      if (idProperty) {
        idProperty.hasAnnotation(
          AnnotationNames.ValueGeneratorFactory,
          DOCUMENT_ID_GENERATOR,
          ConfigurationSource.Convention
        );
        entityTypeBuilder.hasKey([idProperty.metadata], ConfigurationSource.Convention);
      }

      const rawDocument = entityTypeBuilder.property(RAW_DOCUMENT_PROPERTY_NAME, Object, ConfigurationSource.Convention);
      rawDocument
        ?.hasAnnotation(AnnotationNames.PropertyName, "", ConfigurationSource.Convention)
        ?.valueGenerated("onAddOrUpdate", ConfigurationSource.Convention);
      return;
    }

    // Key discovery must not see `id` again before it is gone
    context.delayConventions(() => {
      const idProperty = entityType.findDeclaredProperty(ID_PROPERTY_NAME);
      if (idProperty) {
        const key = entityType.findKey([idProperty]);
        if (key) {
          entityTypeBuilder.hasNoKey(key, ConfigurationSource.Convention);
        }
        entityTypeBuilder.removeUnusedShadowProperties([idProperty]);
      }

      const rawDocument = entityType.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME);
      if (rawDocument) {
        entityTypeBuilder.removeUnusedShadowProperties([rawDocument]);
      }
    });
  }
}
