/**
 * Foreign Key Attribute Tests
 */

import "reflect-metadata";
import { Column, ForeignKey, InverseProperty, Navigation } from "../../decorators";
import { ModelEventId } from "../../diagnostics";
import { ModelConfigurationError, ModelErrorCode } from "../../errors";
import { ConfigurationSource } from "../../metadata/configuration-source";
import type { Related } from "../../types";
import { catchError, createModelBuilder, entityTypeOf, propertyNames } from "../../__tests__/model-test-helpers";

describe("ForeignKeyAttributeConvention", () => {
  // ===========================================================================
  // Pinning properties
  // ===========================================================================
  describe("pinning", () => {
    it("should use the property naming the navigation", () => {
      class Author {
        @Column()
        id!: number;

        @Navigation(() => Book, { collection: true })
        books!: Related<Book>[];
      }

      class Book {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("writer")
        writerRef!: number;

        @Navigation(() => Author)
        writer!: Related<Author>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Author, Book] });
      const book = entityTypeOf(modelBuilder.build(), Book);

      const [foreignKey] = book.getForeignKeys();
      expect(propertyNames(foreignKey)).toEqual(["writerRef"]);
      expect(foreignKey.propertiesConfigurationSource).toBe(ConfigurationSource.DataAnnotation);
      expect(foreignKey.dependentToPrincipalConfigurationSource).toBe(ConfigurationSource.DataAnnotation);
      expect(foreignKey.principalToDependent?.name).toBe("books");
      expect(book.findProperty("writerId")).toBeUndefined();
      expect(book.findProperty("writerRef")?.valueGenerated).toBe("never");
    });

    it("should use the properties a navigation lists", () => {
      class Person {
        @Column()
        id!: number;
      }

      class Car {
        @Column()
        id!: number;

        @Column()
        ownerRef!: number;

        @Navigation(() => Person)
        @ForeignKey("ownerRef")
        owner!: Related<Person>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Car] });
      const car = entityTypeOf(modelBuilder.build(), Car);

      const [foreignKey] = car.getForeignKeys();
      expect(propertyNames(foreignKey)).toEqual(["ownerRef"]);
      expect(foreignKey.propertiesConfigurationSource).toBe(ConfigurationSource.DataAnnotation);
      expect(foreignKey.dependentToPrincipal?.name).toBe("owner");
      expect(car.findProperty("ownerId")).toBeUndefined();
    });
  });

  // ===========================================================================
  // Principal-side attributes
  // ===========================================================================
  describe("inversion", () => {
    it("should make the attributed type the dependent", () => {
      class Passport {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("holder")
        holderRef!: number;

        @Navigation(() => Citizen)
        holder!: Related<Citizen>;
      }

      class Citizen {
        @Column()
        id!: number;

        @Navigation(() => Passport)
        passport!: Related<Passport>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Passport, Citizen] });
      const model = modelBuilder.build();
      const passport = entityTypeOf(model, Passport);
      const citizen = entityTypeOf(model, Citizen);

      const [foreignKey] = passport.getForeignKeys();
      expect(passport.getForeignKeys()).toHaveLength(1);
      expect(propertyNames(foreignKey)).toEqual(["holderRef"]);
      expect(foreignKey.principalEntityType.name).toBe("Citizen");
      expect(foreignKey.dependentToPrincipal?.name).toBe("holder");
      expect(foreignKey.principalToDependent?.name).toBe("passport");
      expect(citizen.getForeignKeys()).toHaveLength(0);
      expect(citizen.findProperty("passportId")).toBeUndefined();
      expect(passport.findProperty("holderId")).toBeUndefined();
    });
  });

  // ===========================================================================
  // Splitting disagreeing ends
  // ===========================================================================
  describe("splitting", () => {
    it("should split a relationship attributed on both properties", () => {
      class Passport {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("holder")
        holderRef!: number;

        @Navigation(() => Citizen)
        holder!: Related<Citizen>;
      }

      class Citizen {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("passport")
        passportRef!: number;

        @Navigation(() => Passport)
        passport!: Related<Passport>;
      }

      const { modelBuilder, diagnostics } = createModelBuilder({ entities: [Passport, Citizen] });
      const model = modelBuilder.build();
      const [toPassport] = entityTypeOf(model, Citizen).getForeignKeys();
      const [toCitizen] = entityTypeOf(model, Passport).getForeignKeys();

      expect(
        diagnostics.warnings.filter((w) => w.eventId === ModelEventId.ForeignKeyAttributesOnBothPropertiesWarning)
      ).toEqual([
        {
          eventId: ModelEventId.ForeignKeyAttributesOnBothPropertiesWarning,
          message:
            "Both 'Passport.holderRef' and 'Citizen.passportRef' carry a foreign key attribute for the same relationship. The navigations are configured as separate relationships.",
          data: {
            principalToDependent: "Passport.holder",
            dependentToPrincipal: "Citizen.passport",
            principalProperty: "holderRef",
            dependentProperty: "passportRef",
          },
        },
      ]);
      expect(propertyNames(toPassport)).toEqual(["passportRef"]);
      expect(toPassport.dependentToPrincipal?.name).toBe("passport");
      expect(toPassport.principalToDependent).toBeUndefined();
      expect(propertyNames(toCitizen)).toEqual(["holderRef"]);
      expect(toCitizen.principalEntityType.name).toBe("Citizen");
      expect(toCitizen.dependentToPrincipal?.name).toBe("holder");
      expect(toCitizen.principalToDependent).toBeUndefined();
    });

    it("should split a relationship attributed on both navigations", () => {
      class Passport {
        @Column()
        id!: number;

        @Column()
        holderRef!: number;

        @Navigation(() => Citizen)
        @ForeignKey("holderRef")
        holder!: Related<Citizen>;
      }

      class Citizen {
        @Column()
        id!: number;

        @Column()
        passportRef!: number;

        @Navigation(() => Passport)
        @ForeignKey("passportRef")
        passport!: Related<Passport>;
      }

      const { modelBuilder, diagnostics } = createModelBuilder({ entities: [Passport, Citizen] });
      const model = modelBuilder.build();

      expect(
        diagnostics.warnings.filter((w) => w.eventId === ModelEventId.ForeignKeyAttributesOnBothNavigationsWarning)
      ).toEqual([
        {
          eventId: ModelEventId.ForeignKeyAttributesOnBothNavigationsWarning,
          message:
            "Both navigations 'Citizen.passport' and 'Passport.holder' carry a foreign key attribute. The navigations are configured as separate relationships.",
          data: { dependentToPrincipal: "Citizen.passport", principalToDependent: "Passport.holder" },
        },
      ]);
      expect(entityTypeOf(model, Citizen).getForeignKeys().map(propertyNames)).toEqual([["passportRef"]]);
      expect(entityTypeOf(model, Passport).getForeignKeys().map(propertyNames)).toEqual([["holderRef"]]);
    });

    it("should split when a navigation and a property name different keys", () => {
      class Passport {
        @Column()
        id!: number;

        @Navigation(() => Citizen)
        @ForeignKey("holderCode")
        holder!: Related<Citizen>;
      }

      class Citizen {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("passport")
        passportRef!: number;

        @Navigation(() => Passport)
        passport!: Related<Passport>;
      }

      const { modelBuilder, diagnostics } = createModelBuilder({ entities: [Passport, Citizen] });
      const model = modelBuilder.build();
      const passport = entityTypeOf(model, Passport);

      expect(
        diagnostics.warnings.filter(
          (w) => w.eventId === ModelEventId.ConflictingForeignKeyAttributesOnNavigationAndPropertyWarning
        )
      ).toEqual([
        {
          eventId: ModelEventId.ConflictingForeignKeyAttributesOnNavigationAndPropertyWarning,
          message:
            "The foreign key attribute on navigation 'Passport.holder' conflicts with the one on property 'passportRef'. The navigations are configured as separate relationships.",
          data: { navigation: "Passport.holder", property: "passportRef" },
        },
      ]);
      expect(entityTypeOf(model, Citizen).getForeignKeys().map(propertyNames)).toEqual([["passportRef"]]);
      expect(passport.getForeignKeys().map(propertyNames)).toEqual([["holderCode"]]);
      expect(passport.findProperty("holderCode")?.isShadowProperty()).toBe(true);
    });

    it("should refuse to split ends joined by an inverse property attribute", () => {
      class Passport {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("holder")
        holderRef!: number;

        @Navigation(() => Citizen)
        holder!: Related<Citizen>;
      }

      class Citizen {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("passport")
        passportRef!: number;

        @Navigation(() => Passport)
        @InverseProperty("holder")
        passport!: Related<Passport>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Passport, Citizen] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toBeInstanceOf(ModelConfigurationError);
      expect(error).toMatchObject({ code: ModelErrorCode.INVALID_RELATIONSHIP_USING_DATA_ANNOTATIONS });
    });
  });

  // ===========================================================================
  // Configuration errors
  // ===========================================================================
  describe("errors", () => {
    it("should reject several properties naming one navigation", () => {
      class Author {
        @Column()
        id!: number;
      }

      class Book {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("writer")
        writerRef!: number;

        @Column()
        @ForeignKey("writer")
        writerRegion!: number;

        @Navigation(() => Author)
        writer!: Related<Author>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Book] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toBeInstanceOf(ModelConfigurationError);
      expect(error).toMatchObject({
        code: ModelErrorCode.COMPOSITE_FK_ON_PROPERTY,
        context: { entityType: "Book", navigation: "writer" },
      });
    });

    it("should reject a malformed property list on a navigation", () => {
      class Person {
        @Column()
        id!: number;
      }

      class Car {
        @Column()
        id!: number;

        @Navigation(() => Person)
        @ForeignKey("ownerRef,,ownerRegion")
        owner!: Related<Person>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Car] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toMatchObject({
        code: ModelErrorCode.INVALID_PROPERTY_LIST_ON_NAVIGATION,
        context: { entityType: "Car", navigation: "owner", attribute: "ownerRef,,ownerRegion" },
      });
    });

    it("should reject two navigations naming the same foreign key", () => {
      class User {
        @Column()
        id!: number;
      }

      class Post {
        @Column()
        id!: number;

        @Column()
        userRef!: number;

        @Navigation(() => User)
        @ForeignKey("userRef")
        author!: Related<User>;

        @Navigation(() => User)
        @ForeignKey("userRef")
        editor!: Related<User>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Post] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toMatchObject({
        code: ModelErrorCode.MULTIPLE_NAVIGATIONS_SAME_FK,
        context: { entityType: "Post", foreignKey: "userRef" },
      });
    });

    it("should reject a principal property backing a collection", () => {
      class Author {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("books")
        bookRef!: number;

        @Navigation(() => Book, { collection: true })
        books!: Related<Book>[];
      }

      class Book {
        @Column()
        id!: number;

        @Navigation(() => Author)
        author!: Related<Author>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Author, Book] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toMatchObject({
        code: ModelErrorCode.FK_ATTRIBUTE_ON_NON_UNIQUE_PRINCIPAL,
        context: { navigation: "books", principalEntityType: "Author", dependentEntityType: "Book" },
      });
    });
    it("should reject properties already backing another attributed relationship", () => {
      class User {
        @Column()
        id!: number;
      }

      class Post {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("author")
        userRef!: number;

        @Navigation(() => User)
        author!: Related<User>;

        @Navigation(() => User)
        @ForeignKey("userRef")
        editor!: Related<User>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Post] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toBeInstanceOf(ModelConfigurationError);
      expect(error).toMatchObject({
        code: ModelErrorCode.CONFLICTING_FOREIGN_KEY_ATTRIBUTES,
        context: { entityType: "Post", properties: ["userRef"] },
      });
    });

    it("should reject a property and its navigation naming each other differently", () => {
      class Passport {
        @Column()
        id!: number;
      }

      class Citizen {
        @Column()
        id!: number;

        @Column()
        @ForeignKey("passport")
        passportRef!: number;

        @Navigation(() => Passport)
        @ForeignKey("passportCode")
        passport!: Related<Passport>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Citizen] });

      const error = catchError(() => modelBuilder.build());

      expect(error).toMatchObject({
        code: ModelErrorCode.FK_ATTRIBUTE_ON_PROPERTY_NAVIGATION_MISMATCH,
        context: { entityType: "Citizen", navigation: "passport", property: "passportRef" },
      });
    });
  });
});
