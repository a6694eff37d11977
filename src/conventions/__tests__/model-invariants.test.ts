/**
 * Model Invariant Tests
 *
 * Properties that hold across conventions: running them again on a settled
 * model changes nothing, removing a type leaves nothing pointing at it, and
 * attribute or explicit facts survive later convention passes.
 */

import "reflect-metadata";
import { Column, ForeignKey, Key, Navigation } from "../../decorators";
import { ConfigurationSource } from "../../metadata/configuration-source";
import type { InternalEntityTypeBuilder } from "../../metadata/internal-entity-type-builder";
import type { Model } from "../../metadata/model";
import type { Related } from "../../types";
import { createModelBuilder, propertyNames } from "../../__tests__/model-test-helpers";

class Blog {
  @Column()
  id!: number;

  @Column()
  title!: string;

  @Navigation(() => Post, { collection: true })
  posts!: Related<Post>[];
}

class Post {
  @Column()
  id!: number;

  @Column()
  body!: string;

  @Navigation(() => Blog)
  blog!: Related<Blog>;
}

describe("model invariants", () => {
  // ===========================================================================
  // Helper Functions
  // ===========================================================================

  function describeModel(model: Model) {
    return model.getEntityTypes().map((entityType) => ({
      name: entityType.name,
      properties: entityType.getDeclaredProperties().map((p) => `${p.name}:${p.valueGenerated}`),
      keys: entityType.getDeclaredKeys().map((k) => k.properties.map((p) => p.name)),
      foreignKeys: entityType.getDeclaredForeignKeys().map((fk) => ({
        properties: propertyNames(fk),
        principal: fk.principalEntityType.name,
        toPrincipal: fk.dependentToPrincipal?.name,
        toDependent: fk.principalToDependent?.name,
      })),
    }));
  }

  function runConventionsAgain(entityTypeBuilder: InternalEntityTypeBuilder): void {
    entityTypeBuilder.modelBuilder.dispatcher.raise("entityTypeAdded", entityTypeBuilder, entityTypeBuilder);
  }

  // ===========================================================================
  // Idempotence
  // ===========================================================================
  describe("idempotence", () => {
    it("should leave a settled model unchanged when its types are processed again", () => {
      const { modelBuilder } = createModelBuilder({ entities: [Blog, Post] });
      const blog = modelBuilder.entity(Blog);
      const post = modelBuilder.entity(Post);
      const model = blog.modelBuilder.metadata;
      const settled = describeModel(model);

      runConventionsAgain(blog);
      runConventionsAgain(post);

      expect(describeModel(model)).toEqual(settled);
      expect(settled).toEqual([
        {
          name: "Blog",
          properties: ["id:onAdd", "title:never"],
          keys: [["id"]],
          foreignKeys: [],
        },
        {
          name: "Post",
          properties: ["id:onAdd", "body:never", "blogId:never"],
          keys: [["id"]],
          foreignKeys: [{ properties: ["blogId"], principal: "Blog", toPrincipal: "blog", toDependent: "posts" }],
        },
      ]);
    });
  });

  // ===========================================================================
  // Cascade consistency
  // ===========================================================================
  describe("removing an entity type", () => {
    it("should take the relationships of a removed principal with it", () => {
      const { modelBuilder } = createModelBuilder({ entities: [Blog, Post] });
      const blog = modelBuilder.entity(Blog);
      const post = modelBuilder.entity(Post);
      const blogType = blog.metadata;

      expect(blog.modelBuilder.hasNoEntityType(blogType, ConfigurationSource.Explicit)).toBe(true);

      expect(blogType.isInModel).toBe(false);
      expect(blog.modelBuilder.metadata.findEntityType(Blog)).toBeUndefined();
      expect(blogType.getReferencingForeignKeys()).toEqual([]);
      expect(blogType.getDeclaredProperties()).toEqual([]);
      expect(blogType.getDeclaredKeys()).toEqual([]);
      expect(blogType.findPrimaryKey()).toBeUndefined();
      expect(post.metadata.getForeignKeys()).toEqual([]);
      expect(post.metadata.findNavigation("blog")).toBeUndefined();
      expect(post.metadata.findProperty("blogId")).toBeUndefined();
    });

    it("should clear the inverse navigation of a removed dependent", () => {
      const { modelBuilder } = createModelBuilder({ entities: [Blog, Post] });
      const blog = modelBuilder.entity(Blog);
      const post = modelBuilder.entity(Post);

      blog.modelBuilder.hasNoEntityType(post.metadata, ConfigurationSource.Explicit);

      expect(post.metadata.isInModel).toBe(false);
      expect(blog.metadata.findNavigation("posts")).toBeUndefined();
      expect(blog.metadata.getReferencingForeignKeys()).toEqual([]);
      expect(blog.metadata.findPrimaryKey()?.properties.map((p) => p.name)).toEqual(["id"]);
    });
  });

  // ===========================================================================
  // Configuration-source monotonicity
  // ===========================================================================
  describe("configuration sources", () => {
    it("should keep an attribute key when key discovery runs again", () => {
      class Reading {
        @Column()
        id!: number;

        @Key()
        @Column()
        serial!: number;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Reading] });
      const reading = modelBuilder.entity(Reading);

      runConventionsAgain(reading);

      expect(reading.metadata.findPrimaryKey()?.properties.map((p) => p.name)).toEqual(["serial"]);
      expect(reading.metadata.primaryKeyConfigurationSource).toBe(ConfigurationSource.DataAnnotation);
      expect(reading.metadata.findProperty("serial")?.valueGenerated).toBe("onAdd");
    });

    it("should keep an attribute foreign key when relationship discovery runs again", () => {
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

        @Column()
        notes!: string;

        @Navigation(() => Author)
        writer!: Related<Author>;
      }

      const { modelBuilder } = createModelBuilder({ entities: [Author, Book] });
      modelBuilder.entity(Author);
      const book = modelBuilder.entity(Book);

      book.ignore("notes", ConfigurationSource.Explicit);
      runConventionsAgain(book);

      const [foreignKey] = book.metadata.getForeignKeys();
      expect(book.metadata.getForeignKeys()).toHaveLength(1);
      expect(propertyNames(foreignKey)).toEqual(["writerRef"]);
      expect(foreignKey.propertiesConfigurationSource).toBe(ConfigurationSource.DataAnnotation);
      expect(foreignKey.principalToDependent?.name).toBe("books");
      expect(book.metadata.findProperty("writerId")).toBeUndefined();
    });
  });
});
