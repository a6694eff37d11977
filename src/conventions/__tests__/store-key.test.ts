/**
 * Store Key Tests
 *
 * Document roots get a string id key and a raw document property.
 */

import "reflect-metadata";
import { Column, Container, Navigation, Owned } from "../../decorators";
import { ConfigurationSource } from "../../metadata/configuration-source";
import { AnnotationNames } from "../../types";
import type { Related } from "../../types";
import {
  DOCUMENT_ID_GENERATOR,
  ID_PROPERTY_NAME,
  RAW_DOCUMENT_PROPERTY_NAME,
} from "../store-key-convention";
import { createModelBuilder, entityTypeOf, propertyNames } from "../../__tests__/model-test-helpers";

describe("StoreKeyConvention", () => {
  it("should key a document root by a generated string id", () => {
    @Container("orders")
    class Order {
      @Column()
      reference!: string;
    }

    const { modelBuilder } = createModelBuilder({ entities: [Order], conventions: "document" });
    const order = entityTypeOf(modelBuilder.build(), Order);
    const id = order.findProperty(ID_PROPERTY_NAME);

    expect(order.findAnnotation(AnnotationNames.ContainerName)?.value).toBe("orders");
    expect(order.findPrimaryKey()?.properties.map((p) => p.name)).toEqual([ID_PROPERTY_NAME]);
    expect(id?.clrType).toBe(String);
    expect(id?.isShadowProperty()).toBe(true);
    expect(id?.findAnnotation(AnnotationNames.ValueGeneratorFactory)?.value).toBe(DOCUMENT_ID_GENERATOR);
  });

  it("should add a raw document property generated on every write", () => {
    class Order {
      @Column()
      reference!: string;
    }

    const { modelBuilder } = createModelBuilder({ entities: [Order], conventions: "document" });
    const order = entityTypeOf(modelBuilder.build(), Order);
    const rawDocument = order.findProperty(RAW_DOCUMENT_PROPERTY_NAME);

    expect(rawDocument?.clrType).toBe(Object);
    expect(rawDocument?.valueGenerated).toBe("onAddOrUpdate");
    expect(rawDocument?.findAnnotation(AnnotationNames.PropertyName)?.value).toBe("");
  });

  it("should give a derived type neither property of its own", () => {
    class Shape {
      @Column()
      label!: string;
    }

    class Circle extends Shape {
      @Column()
      radius!: number;
    }

    const { modelBuilder } = createModelBuilder({ entities: [Shape, Circle], conventions: "document" });
    const model = modelBuilder.build();
    const circle = entityTypeOf(model, Circle);

    expect(circle.baseType?.name).toBe("Shape");
    expect(circle.findDeclaredProperty(ID_PROPERTY_NAME)).toBeUndefined();
    expect(circle.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME)).toBeUndefined();
    expect(circle.findProperty(ID_PROPERTY_NAME)?.declaringEntityType.name).toBe("Shape");
  });

  it("should drop the id key of a derived type added before its base", () => {
    class Shape {
      @Column()
      label!: string;
    }

    class Circle extends Shape {
      @Column()
      radius!: number;
    }

    const { modelBuilder } = createModelBuilder({ entities: [Circle, Shape], conventions: "document" });
    const model = modelBuilder.build();
    const circle = entityTypeOf(model, Circle);

    expect(circle.baseType).toBe(entityTypeOf(model, Shape));
    expect(circle.getDeclaredKeys()).toEqual([]);
    expect(circle.findDeclaredProperty(ID_PROPERTY_NAME)).toBeUndefined();
    expect(circle.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME)).toBeUndefined();
    expect(circle.findPrimaryKey()?.declaringEntityType.name).toBe("Shape");
  });

  // ===========================================================================
  // Owned types
  // ===========================================================================
  describe("owned types", () => {
    @Owned()
    class Address {
      @Column()
      street!: string;
    }

    class Person {
      @Column()
      name!: string;

      @Navigation(() => Address)
      address!: Related<Address>;
    }

    it("should drop the id key and raw document once a type becomes owned", () => {
      const { modelBuilder } = createModelBuilder({ entities: [Person], conventions: "document" });
      const model = modelBuilder.build();
      const address = entityTypeOf(model, Address);
      const ownership = address.findOwnership();

      expect(ownership && propertyNames(ownership)).toEqual(["personId"]);
      expect(address.findDeclaredProperty(ID_PROPERTY_NAME)).toBeUndefined();
      expect(address.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME)).toBeUndefined();
      expect(address.findPrimaryKey()).toBeUndefined();
      expect(entityTypeOf(model, Person).findPrimaryKey()?.properties.map((p) => p.name)).toEqual([ID_PROPERTY_NAME]);
    });

    it("should follow the container name of an owned type", () => {
      @Owned()
      @Container("addresses")
      class StoredAddress {
        @Column()
        street!: string;
      }

      class Customer {
        @Column()
        name!: string;

        @Navigation(() => StoredAddress)
        address!: Related<StoredAddress>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Customer], conventions: "document" });
      modelBuilder.entity(Customer);
      const address = modelBuilder.entity(StoredAddress);
      expect(address.metadata.isOwned()).toBe(true);
      expect(address.metadata.findPrimaryKey()?.properties.map((p) => p.name)).toEqual([ID_PROPERTY_NAME]);

      address.hasAnnotation(AnnotationNames.ContainerName, undefined, ConfigurationSource.Explicit);

      expect(address.metadata.findDeclaredProperty(ID_PROPERTY_NAME)).toBeUndefined();
      expect(address.metadata.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME)).toBeUndefined();
      expect(address.metadata.findPrimaryKey()).toBeUndefined();

      address.hasAnnotation(AnnotationNames.ContainerName, "addresses", ConfigurationSource.Explicit);

      expect(address.metadata.findPrimaryKey()?.properties.map((p) => p.name)).toEqual([ID_PROPERTY_NAME]);
      expect(address.metadata.findDeclaredProperty(RAW_DOCUMENT_PROPERTY_NAME)?.valueGenerated).toBe("onAddOrUpdate");
    });
  });

  it("should leave models built with the core conventions alone", () => {
    class Order {
      @Column()
      reference!: string;
    }

    const { modelBuilder } = createModelBuilder({ entities: [Order] });
    const order = entityTypeOf(modelBuilder.build(), Order);

    expect(order.findProperty(ID_PROPERTY_NAME)).toBeUndefined();
    expect(order.findProperty(RAW_DOCUMENT_PROPERTY_NAME)).toBeUndefined();
    expect(order.findPrimaryKey()).toBeUndefined();
  });
});
