/**
 * Convention Dispatcher Tests
 *
 * Ordering, stopping, result replacement, delayed delivery and the depth
 * guard, driven through entity types added by name.
 */

import { ConventionDispatcher, DEFAULT_MAX_CONVENTION_DEPTH } from "../convention-dispatcher";
import { ConventionSet } from "../convention-set";
import type { Convention, EntityTypeAddedConvention } from "../convention-events";
import { ConfigurationSource } from "../../metadata/configuration-source";
import { InternalModelBuilder } from "../../metadata/internal-model-builder";
import { Model } from "../../metadata/model";
import { DecoratorTypeInspector } from "../../reflection";
import { ModelErrorCode, ModelStateError } from "../../errors";

describe("ConventionDispatcher", () => {
  let log: string[];

  beforeEach(() => {
    log = [];
  });

  // ===========================================================================
  // Helper Functions
  // ===========================================================================

  function createModelBuilder(conventions: Convention[], maxConventionDepth?: number): InternalModelBuilder {
    const dispatcher = new ConventionDispatcher(new ConventionSet(conventions), { maxConventionDepth });
    return new InternalModelBuilder(new Model(), dispatcher, new DecoratorTypeInspector());
  }

  function recorder(label = ""): EntityTypeAddedConvention {
    return {
      processEntityTypeAdded(entityTypeBuilder) {
        log.push(`${label}${entityTypeBuilder.metadata.name}`);
      },
    };
  }

  // ===========================================================================
  // Ordering and stopping
  // ===========================================================================
  describe("dispatch", () => {
    it("should run conventions in set order", () => {
      const modelBuilder = createModelBuilder([recorder("first:"), recorder("second:")]);

      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(log).toEqual(["first:Blog", "second:Blog"]);
    });

    it("should skip the remaining conventions after stopProcessing()", () => {
      const stopping: EntityTypeAddedConvention = {
        processEntityTypeAdded(_entityTypeBuilder, context) {
          context.stopProcessing();
        },
      };
      const modelBuilder = createModelBuilder([recorder("first:"), stopping, recorder("second:")]);

      const result = modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(log).toEqual(["first:Blog"]);
      expect(result?.metadata.name).toBe("Blog");
    });

    it("should return the replacement passed to stopProcessing()", () => {
      const replacing: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          if (entityTypeBuilder.metadata.name === "Blog") {
            context.stopProcessing(
              entityTypeBuilder.modelBuilder.entity("Other", ConfigurationSource.Convention)
            );
          }
        },
      };
      const modelBuilder = createModelBuilder([replacing, recorder("after:")]);

      const result = modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(result?.metadata.name).toBe("Other");
      expect(log).toEqual(["after:Other"]);
    });

    it("should stop and return undefined when the subject leaves the model", () => {
      const removing: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder) {
          entityTypeBuilder.modelBuilder.hasNoEntityType(entityTypeBuilder.metadata, ConfigurationSource.Explicit);
        },
      };
      const modelBuilder = createModelBuilder([removing, recorder()]);

      const result = modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(result).toBeUndefined();
      expect(log).toEqual([]);
      expect(modelBuilder.metadata.findEntityType("Blog")).toBeUndefined();
    });

    it("should only call conventions implementing the event's handler", () => {
      const unrelated = { processKeyAdded: () => log.push("key") };
      const modelBuilder = createModelBuilder([unrelated, recorder()]);

      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(log).toEqual(["Blog"]);
    });
  });

  // ===========================================================================
  // Delayed delivery
  // ===========================================================================
  describe("delayConventions", () => {
    it("should queue events raised in scope and deliver them in order on exit", () => {
      const returned: Array<string | undefined> = [];
      const delaying: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          if (entityTypeBuilder.metadata.name !== "Blog") {
            return;
          }
          context.delayConventions(() => {
            const modelBuilder = entityTypeBuilder.modelBuilder;
            returned.push(modelBuilder.entity("A", ConfigurationSource.Explicit)?.metadata.name);
            returned.push(modelBuilder.entity("B", ConfigurationSource.Explicit)?.metadata.name);
            log.push("scope end");
          });
        },
      };
      const modelBuilder = createModelBuilder([delaying, recorder()]);

      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(returned).toEqual(["A", "B"]);
      expect(log).toEqual(["scope end", "A", "B", "Blog"]);
    });

    it("should dispatch events raised while flushing immediately", () => {
      const delaying: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          const modelBuilder = entityTypeBuilder.modelBuilder;
          const name = entityTypeBuilder.metadata.name;
          if (name === "Blog") {
            context.delayConventions(() => {
              modelBuilder.entity("A", ConfigurationSource.Explicit);
              log.push("scope end");
            });
          } else if (name === "A") {
            modelBuilder.entity("A2", ConfigurationSource.Explicit);
          }
        },
      };
      const modelBuilder = createModelBuilder([delaying, recorder()]);

      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(log).toEqual(["scope end", "A2", "A", "Blog"]);
    });

    it("should flush queued events when the scope throws", () => {
      const throwing: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          if (entityTypeBuilder.metadata.name !== "Blog") {
            return;
          }
          context.delayConventions(() => {
            entityTypeBuilder.modelBuilder.entity("A", ConfigurationSource.Explicit);
            throw new Error("boom");
          });
        },
      };
      const modelBuilder = createModelBuilder([throwing, recorder()]);

      expect(() => modelBuilder.entity("Blog", ConfigurationSource.Explicit)).toThrow("boom");
      expect(log).toEqual(["A"]);
      expect(modelBuilder.dispatcher.isDelaying).toBe(false);
    });

    it("should discard the rest of the queue when a delivered event throws", () => {
      const delaying: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          const modelBuilder = entityTypeBuilder.modelBuilder;
          const name = entityTypeBuilder.metadata.name;
          if (name === "Blog") {
            context.delayConventions(() => {
              modelBuilder.entity("A", ConfigurationSource.Explicit);
              modelBuilder.entity("B", ConfigurationSource.Explicit);
            });
          } else if (name === "A") {
            throw new Error("cannot map A");
          }
        },
      };
      const modelBuilder = createModelBuilder([delaying, recorder()]);

      expect(() => modelBuilder.entity("Blog", ConfigurationSource.Explicit)).toThrow("cannot map A");
      expect(log).toEqual([]);

      modelBuilder.entity("C", ConfigurationSource.Explicit);

      expect(log).toEqual(["C"]);
    });

    it("should rethrow the scope's own error ahead of a delivery failure", () => {
      const delaying: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          const name = entityTypeBuilder.metadata.name;
          if (name === "Blog") {
            context.delayConventions(() => {
              entityTypeBuilder.modelBuilder.entity("A", ConfigurationSource.Explicit);
              throw new Error("boom");
            });
          } else if (name === "A") {
            throw new Error("cannot map A");
          }
        },
      };
      const modelBuilder = createModelBuilder([delaying, recorder()]);

      expect(() => modelBuilder.entity("Blog", ConfigurationSource.Explicit)).toThrow("boom");
      expect(modelBuilder.dispatcher.isDelaying).toBe(false);
    });

    it("should drop queued events whose subject was removed", () => {
      const delaying: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder, context) {
          if (entityTypeBuilder.metadata.name !== "Blog") {
            return;
          }
          const modelBuilder = entityTypeBuilder.modelBuilder;
          context.delayConventions(() => {
            const added = modelBuilder.entity("A", ConfigurationSource.Explicit);
            if (added) {
              modelBuilder.hasNoEntityType(added.metadata, ConfigurationSource.Explicit);
            }
          });
        },
      };
      const modelBuilder = createModelBuilder([delaying, recorder()]);

      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      expect(log).toEqual(["Blog"]);
      expect(modelBuilder.metadata.findEntityType("A")).toBeUndefined();
    });
  });

  // ===========================================================================
  // Guards
  // ===========================================================================
  describe("guards", () => {
    it("should default the depth bound to 64", () => {
      expect(DEFAULT_MAX_CONVENTION_DEPTH).toBe(64);
    });

    it("should throw when conventions keep triggering each other", () => {
      const runaway: EntityTypeAddedConvention = {
        processEntityTypeAdded(entityTypeBuilder) {
          entityTypeBuilder.modelBuilder.entity(`${entityTypeBuilder.metadata.name}x`, ConfigurationSource.Convention);
        },
      };
      const modelBuilder = createModelBuilder([runaway], 5);

      let error: unknown;
      try {
        modelBuilder.entity("Blog", ConfigurationSource.Explicit);
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(ModelStateError);
      expect(error).toMatchObject({
        code: ModelErrorCode.CONVENTION_DEPTH_EXCEEDED,
        context: { event: "entityTypeAdded", maxConventionDepth: 5 },
      });
    });

    it("should refuse changes after finalization", () => {
      const modelBuilder = createModelBuilder([recorder()]);
      modelBuilder.entity("Blog", ConfigurationSource.Explicit);

      const model = modelBuilder.finalizeModel();

      expect(model.isReadOnly).toBe(true);
      expect(() => modelBuilder.entity("Late", ConfigurationSource.Explicit)).toThrow(ModelStateError);
      expect(log).toEqual(["Blog"]);
    });
  });
});
