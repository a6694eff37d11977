/**
 * Error classes for model building.
 * Fatal configuration conflicts surface as ModelConfigurationError from the
 * builder call that triggered them; the model must be treated as invalid.
 */

export enum ModelErrorCode {
  // Foreign key attributes (1xxx)
  COMPOSITE_FK_ON_PROPERTY = "M1000",
  FK_ATTRIBUTE_ON_PROPERTY_NAVIGATION_MISMATCH = "M1001",
  INVALID_PROPERTY_LIST_ON_NAVIGATION = "M1002",
  MULTIPLE_NAVIGATIONS_SAME_FK = "M1003",
  CONFLICTING_FOREIGN_KEY_ATTRIBUTES = "M1004",
  FK_ATTRIBUTE_ON_NON_UNIQUE_PRINCIPAL = "M1005",
  INVALID_RELATIONSHIP_USING_DATA_ANNOTATIONS = "M1006",

  // Inverse navigations (2xxx)
  INVALID_NAVIGATION_WITH_INVERSE_PROPERTY = "M2000",
  SELF_REFERENCING_NAVIGATION_WITH_INVERSE_PROPERTY = "M2001",
  INVERSE_PROPERTY_MISMATCH = "M2002",

  // Service properties (3xxx)
  AMBIGUOUS_SERVICE_PROPERTY = "M3000",

  // Structure (4xxx)
  KEY_ON_DERIVED_TYPE = "M4000",
  FOREIGN_KEY_COUNT_MISMATCH = "M4001",
  INVALID_BASE_TYPE = "M4002",
  CLASHING_ENTITY_TYPE = "M4003",
  INVALID_NAVIGATION = "M4004",

  // Pipeline state (9xxx)
  MODEL_READ_ONLY = "M9000",
  CONVENTION_DEPTH_EXCEEDED = "M9001",
}

/**
 * Base error class for all model building errors
 */
export class ModelError extends Error {
  public readonly code: ModelErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ModelErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ModelError";
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * The configuration describes a model that cannot exist.
 */
export class ModelConfigurationError extends ModelError {
  constructor(message: string, code: ModelErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ModelConfigurationError";
  }
}

/**
 * The pipeline was driven in a way it does not support.
 */
export class ModelStateError extends ModelError {
  constructor(message: string, code: ModelErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ModelStateError";
  }
}
