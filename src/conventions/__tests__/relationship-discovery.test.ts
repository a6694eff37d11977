/**
 * Relationship Discovery Tests
 *
 * Navigation members turn into foreign keys, paired with a unique inverse
 * when there is one.
 */

import "reflect-metadata";
import { Column, Entity, Keyless, Navigation, Owned } from "../../decorators";
import { ModelEventId } from "../../diagnostics";
import { ConfigurationSource } from "../../metadata/configuration-source";
import { AnnotationNames } from "../../types";
import type { Related } from "../../types";
import { createModelBuilder, entityTypeOf, propertyNames } from "../../__tests__/model-test-helpers";

describe("RelationshipDiscoveryConvention", () => {
  // ===========================================================================
  // One-to-many
  // ===========================================================================
  describe("one-to-many", () => {
    it("should pair a collection with its reference inverse through a shadow foreign key", () => {
      @Entity("blogs")
      class Blog {
        @Column()
        id!: number;

        @Navigation(() => Post, { collection: true })
        posts!: Related<Post>[];
      }

      @Entity("posts")
      class Post {
        @Column()
        id!: number;

        @Navigation(() => Blog)
        blog!: Related<Blog>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Blog, Post] });
      const model = modelBuilder.build();
      const blog = entityTypeOf(model, Blog);
      const post = entityTypeOf(model, Post);

      const foreignKeys = post.getForeignKeys();
      expect(foreignKeys).toHaveLength(1);
      const [foreignKey] = foreignKeys;
      expect(foreignKey.principalEntityType).toBe(blog);
      expect(propertyNames(foreignKey)).toEqual(["blogId"]);
      expect(foreignKey.isUnique).toBe(false);
      expect(foreignKey.dependentToPrincipal?.name).toBe("blog");
      expect(foreignKey.principalToDependent?.name).toBe("posts");
      expect(blog.findNavigation("posts")?.isCollection()).toBe(true);

      const blogId = post.findProperty("blogId");
      expect(blogId?.isShadowProperty()).toBe(true);
      expect(blogId?.clrType).toBe(Number);
      expect(blogId?.columnType).toBe("integer");
      expect(blogId?.valueGenerated).toBe("never");
    });

    it("should key both types by their id members", () => {
      @Entity("blogs")
      class Blog {
        @Column()
        id!: number;

        @Navigation(() => Post, { collection: true })
        posts!: Related<Post>[];
      }

      @Entity("posts")
      class Post {
        @Column()
        id!: number;

        @Navigation(() => Blog)
        blog!: Related<Blog>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Blog, Post] });
      const model = modelBuilder.build();
      const blog = entityTypeOf(model, Blog);

      expect(blog.findPrimaryKey()?.properties.map((p) => p.name)).toEqual(["id"]);
      expect(blog.primaryKeyConfigurationSource).toBe(ConfigurationSource.Convention);
      expect(blog.findProperty("id")?.valueGenerated).toBe("onAdd");
      expect(blog.findAnnotation(AnnotationNames.TableName)?.value).toBe("blogs");
      expect(entityTypeOf(model, Post).findProperty("id")?.valueGenerated).toBe("onAdd");
    });

    it("should leave navigations unpaired while two candidates point back", () => {
      class User {
        @Column()
        id!: number;

        @Navigation(() => Post, { collection: true })
        posts!: Related<Post>[];
      }

      class Post {
        @Column()
        id!: number;

        @Navigation(() => User)
        author!: Related<User>;

        @Navigation(() => User)
        editor!: Related<User>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [User, Post] });
      const post = entityTypeOf(modelBuilder.build(), Post);

      const foreignKeys = post.getForeignKeys();
      expect(foreignKeys.map((fk) => propertyNames(fk)[0]).sort()).toEqual(["authorId", "editorId", "userId"]);
      expect(foreignKeys.every((fk) => fk.getNavigations().length === 1)).toBe(true);
    });

    it("should pair the remaining candidate once the other is ignored", () => {
      class User {
        @Column()
        id!: number;

        @Navigation(() => Post, { collection: true })
        posts!: Related<Post>[];
      }

      class Post {
        @Column()
        id!: number;

        @Navigation(() => User)
        author!: Related<User>;

        @Navigation(() => User)
        editor!: Related<User>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [User, Post] });
      modelBuilder.entity(Post).ignore("editor", ConfigurationSource.Explicit);
      const post = entityTypeOf(modelBuilder.build(), Post);

      const foreignKeys = post.getForeignKeys();
      expect(foreignKeys).toHaveLength(1);
      expect(propertyNames(foreignKeys[0])).toEqual(["authorId"]);
      expect(foreignKeys[0].dependentToPrincipal?.name).toBe("author");
      expect(foreignKeys[0].principalToDependent?.name).toBe("posts");
      expect(post.findProperty("userId")).toBeUndefined();
      expect(post.findProperty("editorId")).toBeUndefined();
    });
  });

  // ===========================================================================
  // Other cardinalities
  // ===========================================================================
  describe("cardinality", () => {
    it("should make a reference pair one-to-one", () => {
      class Person {
        @Column()
        id!: number;

        @Navigation(() => Passport)
        passport!: Related<Passport>;
      }

      class Passport {
        @Column()
        id!: number;

        @Navigation(() => Person)
        holder!: Related<Person>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Person, Passport] });
      const model = modelBuilder.build();
      const passport = entityTypeOf(model, Passport);

      expect(entityTypeOf(model, Person).getForeignKeys()).toHaveLength(0);
      const [foreignKey] = passport.getForeignKeys();
      expect(foreignKey.isUnique).toBe(true);
      expect(propertyNames(foreignKey)).toEqual(["holderId"]);
      expect(foreignKey.dependentToPrincipal?.name).toBe("holder");
      expect(foreignKey.principalToDependent?.name).toBe("passport");
    });

    it("should not pair two collections", () => {
      class Student {
        @Column()
        id!: number;

        @Navigation(() => Course, { collection: true })
        courses!: Related<Course>[];
      }

      class Course {
        @Column()
        id!: number;

        @Navigation(() => Student, { collection: true })
        students!: Related<Student>[];
      }

      const { modelBuilder } = createModelBuilder({ entities: [Student, Course] });
      const model = modelBuilder.build();
      const student = entityTypeOf(model, Student);
      const course = entityTypeOf(model, Course);

      const [studentForeignKey] = student.getForeignKeys();
      expect(propertyNames(studentForeignKey)).toEqual(["courseId"]);
      expect(studentForeignKey.principalToDependent?.name).toBe("students");
      expect(studentForeignKey.dependentToPrincipal).toBeUndefined();

      const [courseForeignKey] = course.getForeignKeys();
      expect(propertyNames(courseForeignKey)).toEqual(["studentId"]);
      expect(courseForeignKey.principalToDependent?.name).toBe("courses");
      expect(course.findNavigation("students")?.findInverse()).toBeUndefined();
    });
  });

  // ===========================================================================
  // Targets
  // ===========================================================================
  describe("targets", () => {
    it("should make an @Owned target owned by the navigating type", () => {
      @Owned()
      class Address {
        @Column()
        street!: string;
      }

      class Customer {
        @Column()
        id!: number;

        @Navigation(() => Address)
        address!: Related<Address>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Customer] });
      const model = modelBuilder.build();
      const address = entityTypeOf(model, Address);
      const ownership = address.findOwnership();

      expect(address.isOwned()).toBe(true);
      expect(ownership?.principalEntityType).toBe(entityTypeOf(model, Customer));
      expect(ownership?.principalToDependent?.name).toBe("address");
      expect(ownership?.isUnique).toBe(true);
      expect(ownership?.isRequired).toBe(true);
      expect(ownership && propertyNames(ownership)).toEqual(["customerId"]);
    });

    it("should not build relationships to keyless targets", () => {
      @Keyless()
      class Report {
        @Column()
        title!: string;
      }

      class Dashboard {
        @Column()
        id!: number;

        @Navigation(() => Report)
        report!: Related<Report>;
      }

      const { modelBuilder, diagnostics } = createModelBuilder({ entities: [Dashboard] });
      const model = modelBuilder.build();

      expect(entityTypeOf(model, Dashboard).getForeignKeys()).toHaveLength(0);
      // Unreachable without a navigation
      expect(model.findEntityType(Report)).toBeUndefined();
      expect(diagnostics.informations).toEqual([
        {
          eventId: ModelEventId.EntityTypeRemovedInformation,
          message: "Entity type 'Report' is not reachable through any navigation and was removed from the model.",
          data: { entityType: "Report" },
        },
      ]);
    });

    it("should not add ignored target types", () => {
      class Tag {
        @Column()
        id!: number;
      }

      class Article {
        @Column()
        id!: number;

        @Navigation(() => Tag, { collection: true })
        tags!: Related<Tag>[];
      }

      const { modelBuilder } = createModelBuilder({ entities: [Article] });
      const model = modelBuilder.ignore(Tag).build();

      expect(model.findEntityType(Tag)).toBeUndefined();
      expect(entityTypeOf(model, Article).getNavigations()).toHaveLength(0);
    });
  });
});
