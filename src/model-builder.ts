/**
 * ModelBuilder is the primary orchestrator for model building.
 *
 * Responsibilities:
 * 1. Wires the inspector, diagnostics, binding factories and convention set
 * 2. Takes explicit configuration (entity types, ignored types)
 * 3. Registers the configured entities and finalizes the model once
 * 4. Hands out the read-only model
 */

import { createChildLogger, createLogger } from "./logger";
import type { Logger } from "./logger";
import { resolveLogLevel } from "./config";
import { PinoModelDiagnostics } from "./diagnostics";
import type { ModelDiagnostics } from "./diagnostics";
import { ServiceParameterBindingFactories } from "./parameter-binding";
import { DecoratorTypeInspector } from "./reflection";
import { ConventionDispatcher } from "./conventions/convention-dispatcher";
import {
  createCoreConventionSet,
  createDocumentStoreConventionSet,
} from "./conventions/convention-set";
import type { ConventionSet, ConventionSetDependencies } from "./conventions/convention-set";
import { ConfigurationSource } from "./metadata/configuration-source";
import { Model } from "./metadata/model";
import { InternalModelBuilder } from "./metadata/internal-model-builder";
import type { InternalEntityTypeBuilder } from "./metadata/internal-entity-type-builder";
import { assertAccepted } from "./type-guards";
import type { ModelBuilderOptions } from "./types";

export class ModelBuilder {
  private readonly options: ModelBuilderOptions;
  private readonly logger: Logger;
  private readonly builder: InternalModelBuilder;
  private model: Model | undefined;

  readonly diagnostics: ModelDiagnostics;
  readonly conventionSet: ConventionSet;

  constructor(options: ModelBuilderOptions) {
    this.options = {
      conventions: "core",
      serviceTypes: [],
      ...options,
    };

    this.logger =
      this.options.logger ?? createLogger("model-builder", { level: resolveLogLevel(this.options) });
    this.diagnostics =
      this.options.diagnostics ??
      new PinoModelDiagnostics(createChildLogger(this.logger, { component: "diagnostics" }));

    const dependencies: ConventionSetDependencies = {
      inspector: this.options.inspector ?? new DecoratorTypeInspector(),
      diagnostics: this.diagnostics,
      bindingFactories:
        this.options.bindingFactories ??
        ServiceParameterBindingFactories.forServiceTypes(this.options.serviceTypes ?? []),
    };
    this.conventionSet = this.createConventionSet(dependencies);

    const dispatcher = new ConventionDispatcher(this.conventionSet, {
      maxConventionDepth: this.options.maxConventionDepth,
      logger: createChildLogger(this.logger, { component: "dispatcher" }),
    });
    this.builder = new InternalModelBuilder(new Model(), dispatcher, dependencies.inspector);
  }

  /**
   * Add an entity type explicitly and return its builder for further
   * configuration.
   *
   * @throws Error when the configuration is refused
   *
   * @example
   * ```typescript
   * const modelBuilder = new ModelBuilder({ entities: [Blog] });
   * modelBuilder.entity(Post).ignore("draft", ConfigurationSource.Explicit);
   * const model = modelBuilder.build();
   * ```
   */
  entity(type: Function): InternalEntityTypeBuilder {
    const entityTypeBuilder = this.builder.entity(type, ConfigurationSource.Explicit);
    assertAccepted(entityTypeBuilder, `entity(${type.name})`);
    return entityTypeBuilder;
  }

  /**
   * Keep a type out of the model, removing it if it was already added.
   */
  ignore(type: Function | string): this {
    this.builder.ignore(type, ConfigurationSource.Explicit);
    return this;
  }

  /**
   * Register the configured entities, run finalization and return the
   * read-only model. Safe to call multiple times (idempotent).
   */
  build(): Model {
    if (this.model) {
      return this.model;
    }

    for (const entity of this.options.entities) {
      this.builder.entity(entity, ConfigurationSource.Explicit);
    }
    this.logger.debug(
      `[ModelBuilder] Registered ${this.options.entities.length} entities, ${this.builder.metadata.getEntityTypes().length} entity types discovered`
    );

    this.model = this.builder.finalizeModel();
    this.logger.debug(
      { entityTypes: this.model.getEntityTypes().map((t) => t.name) },
      "[ModelBuilder] Model finalized"
    );
    return this.model;
  }

  get isBuilt(): boolean {
    return this.model !== undefined;
  }

  /**
   * The builder conventions act through. Configuration at sources other
   * than Explicit goes through here.
   */
  get internalBuilder(): InternalModelBuilder {
    return this.builder;
  }

  private createConventionSet(dependencies: ConventionSetDependencies): ConventionSet {
    const conventions = this.options.conventions;
    if (conventions === "document") {
      return createDocumentStoreConventionSet(dependencies);
    }
    if (typeof conventions === "function") {
      return conventions(dependencies);
    }
    return createCoreConventionSet(dependencies);
  }
}
