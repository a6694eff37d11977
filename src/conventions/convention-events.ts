/**
 * Structural change events raised by the builders.
 *
 * Each event names the subject it is raised for (the first argument), the
 * remaining payload, and the result type a convention may replace through
 * `context.stopProcessing(newResult)`. A convention reacts to an event by
 * implementing the matching `process<Event>` method.
 */

import type { ConventionContext } from "./convention-context";
import type { Annotation } from "../metadata/annotatable";
import type { EntityType } from "../metadata/entity-type";
import type { ForeignKey } from "../metadata/foreign-key";
import type { Key } from "../metadata/key";
import type { Navigation } from "../metadata/navigation";
import type { Property } from "../metadata/property";
import type { MemberInfo } from "../types";
import type { InternalModelBuilder } from "../metadata/internal-model-builder";
import type { InternalEntityTypeBuilder } from "../metadata/internal-entity-type-builder";
import type { InternalPropertyBuilder } from "../metadata/internal-property-builder";
import type { InternalKeyBuilder } from "../metadata/internal-key-builder";
import type { InternalRelationshipBuilder } from "../metadata/internal-relationship-builder";

interface EventSignature<TArgs extends unknown[], TResult> {
  args: TArgs;
  result: TResult;
}

export interface ConventionEvents {
  entityTypeAdded: EventSignature<
    [entityTypeBuilder: InternalEntityTypeBuilder],
    InternalEntityTypeBuilder
  >;
  entityTypeIgnored: EventSignature<
    [modelBuilder: InternalModelBuilder, name: string, type: Function | undefined],
    string
  >;
  entityTypeRemoved: EventSignature<
    [modelBuilder: InternalModelBuilder, entityType: EntityType],
    EntityType
  >;
  entityTypeMemberIgnored: EventSignature<
    [entityTypeBuilder: InternalEntityTypeBuilder, name: string],
    string
  >;
  entityTypeBaseTypeChanged: EventSignature<
    [
      entityTypeBuilder: InternalEntityTypeBuilder,
      newBaseType: EntityType | undefined,
      oldBaseType: EntityType | undefined
    ],
    EntityType | undefined
  >;
  entityTypePrimaryKeyChanged: EventSignature<
    [
      entityTypeBuilder: InternalEntityTypeBuilder,
      newPrimaryKey: Key | undefined,
      previousPrimaryKey: Key | undefined
    ],
    Key | undefined
  >;
  entityTypeAnnotationChanged: EventSignature<
    [
      entityTypeBuilder: InternalEntityTypeBuilder,
      name: string,
      annotation: Annotation | undefined,
      oldAnnotation: Annotation | undefined
    ],
    Annotation | undefined
  >;
  propertyAdded: EventSignature<[propertyBuilder: InternalPropertyBuilder], InternalPropertyBuilder>;
  propertyRemoved: EventSignature<
    [entityTypeBuilder: InternalEntityTypeBuilder, property: Property],
    Property
  >;
  keyAdded: EventSignature<[keyBuilder: InternalKeyBuilder], InternalKeyBuilder>;
  keyRemoved: EventSignature<[entityTypeBuilder: InternalEntityTypeBuilder, key: Key], Key>;
  foreignKeyAdded: EventSignature<
    [relationshipBuilder: InternalRelationshipBuilder],
    InternalRelationshipBuilder
  >;
  foreignKeyRemoved: EventSignature<
    [entityTypeBuilder: InternalEntityTypeBuilder, foreignKey: ForeignKey],
    ForeignKey
  >;
  foreignKeyPropertiesChanged: EventSignature<
    [
      relationshipBuilder: InternalRelationshipBuilder,
      oldDependentProperties: readonly Property[],
      oldPrincipalKey: Key
    ],
    InternalRelationshipBuilder
  >;
  foreignKeyOwnershipChanged: EventSignature<
    [relationshipBuilder: InternalRelationshipBuilder],
    InternalRelationshipBuilder
  >;
  navigationAdded: EventSignature<
    [relationshipBuilder: InternalRelationshipBuilder, navigation: Navigation],
    Navigation
  >;
  navigationRemoved: EventSignature<
    [
      sourceEntityTypeBuilder: InternalEntityTypeBuilder,
      targetEntityTypeBuilder: InternalEntityTypeBuilder,
      navigationName: string,
      memberInfo: MemberInfo | undefined
    ],
    string
  >;
  modelFinalized: EventSignature<[modelBuilder: InternalModelBuilder], InternalModelBuilder>;
}

export type ConventionEventKind = keyof ConventionEvents;

export type EventArgs<K extends ConventionEventKind> = ConventionEvents[K]["args"];

export type EventResult<K extends ConventionEventKind> = ConventionEvents[K]["result"];

export type HandlerName<K extends ConventionEventKind> = `process${Capitalize<K>}`;

export type ConventionHandler<K extends ConventionEventKind> = (
  ...args: [...EventArgs<K>, ConventionContext<EventResult<K>>]
) => void;

/**
 * The capability of reacting to one event kind.
 *
 * @example
 * ```typescript
 * class AuditConvention implements ConventionFor<"entityTypeAdded"> {
 *   processEntityTypeAdded(builder: InternalEntityTypeBuilder, context: ConventionContext<InternalEntityTypeBuilder>) {}
 * }
 * ```
 */
export type ConventionFor<K extends ConventionEventKind> = {
  [P in HandlerName<K>]: ConventionHandler<K>;
};

/** Any object; capabilities are detected by handler method */
export type Convention = object;

export const HANDLER_NAMES: { [K in ConventionEventKind]: HandlerName<K> } = {
  entityTypeAdded: "processEntityTypeAdded",
  entityTypeIgnored: "processEntityTypeIgnored",
  entityTypeRemoved: "processEntityTypeRemoved",
  entityTypeMemberIgnored: "processEntityTypeMemberIgnored",
  entityTypeBaseTypeChanged: "processEntityTypeBaseTypeChanged",
  entityTypePrimaryKeyChanged: "processEntityTypePrimaryKeyChanged",
  entityTypeAnnotationChanged: "processEntityTypeAnnotationChanged",
  propertyAdded: "processPropertyAdded",
  propertyRemoved: "processPropertyRemoved",
  keyAdded: "processKeyAdded",
  keyRemoved: "processKeyRemoved",
  foreignKeyAdded: "processForeignKeyAdded",
  foreignKeyRemoved: "processForeignKeyRemoved",
  foreignKeyPropertiesChanged: "processForeignKeyPropertiesChanged",
  foreignKeyOwnershipChanged: "processForeignKeyOwnershipChanged",
  navigationAdded: "processNavigationAdded",
  navigationRemoved: "processNavigationRemoved",
  modelFinalized: "processModelFinalized",
};

export type EntityTypeAddedConvention = ConventionFor<"entityTypeAdded">;
export type EntityTypeIgnoredConvention = ConventionFor<"entityTypeIgnored">;
export type EntityTypeRemovedConvention = ConventionFor<"entityTypeRemoved">;
export type EntityTypeMemberIgnoredConvention = ConventionFor<"entityTypeMemberIgnored">;
export type EntityTypeBaseTypeChangedConvention = ConventionFor<"entityTypeBaseTypeChanged">;
export type EntityTypePrimaryKeyChangedConvention = ConventionFor<"entityTypePrimaryKeyChanged">;
export type EntityTypeAnnotationChangedConvention = ConventionFor<"entityTypeAnnotationChanged">;
export type PropertyAddedConvention = ConventionFor<"propertyAdded">;
export type PropertyRemovedConvention = ConventionFor<"propertyRemoved">;
export type KeyAddedConvention = ConventionFor<"keyAdded">;
export type KeyRemovedConvention = ConventionFor<"keyRemoved">;
export type ForeignKeyAddedConvention = ConventionFor<"foreignKeyAdded">;
export type ForeignKeyRemovedConvention = ConventionFor<"foreignKeyRemoved">;
export type ForeignKeyPropertiesChangedConvention = ConventionFor<"foreignKeyPropertiesChanged">;
export type ForeignKeyOwnershipChangedConvention = ConventionFor<"foreignKeyOwnershipChanged">;
export type NavigationAddedConvention = ConventionFor<"navigationAdded">;
export type NavigationRemovedConvention = ConventionFor<"navigationRemoved">;
export type ModelFinalizedConvention = ConventionFor<"modelFinalized">;
