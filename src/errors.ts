/**
 * Canonical taxonomy of the errors raised by the entity host. Each category
 * carries a stable machine-readable code and the default message used when
 * the caller does not supply one. Transform handler failures have no category:
 * they are rethrown verbatim and never wrapped.
 */
export const ENTITY_ERROR_TAXONOMY = {
  CONFIGURATION: { code: "E-ENTITY-CONFIG", message: "Invalid entity layout" },
  INVALID_DEFINITION: { code: "E-ENTITY-DEFINITION", message: "Invalid entity definition" },
  LOAD_FAILURE: { code: "E-ENTITY-LOAD", message: "Entity unit failed to load" },
  INVALID_PAYLOAD: { code: "E-ENTITY-PAYLOAD", message: "Invalid graph node payload" },
} as const;

/** Union of the supported error categories. */
export type EntityErrorCategory = keyof typeof ENTITY_ERROR_TAXONOMY;

/** Optional knobs enriching an {@link EntityError}. */
export interface EntityErrorOptions {
  hint?: string;
  details?: Record<string, unknown>;
  issues?: unknown;
  cause?: unknown;
}

/**
 * Base class for typed host errors. Concrete subclasses fix the category while
 * keeping the options bag for hints and structured details.
 */
export class EntityError extends Error {
  readonly category: EntityErrorCategory;
  readonly code: string;
  readonly hint?: string;
  readonly details: Record<string, unknown>;
  readonly issues?: unknown;

  constructor(category: EntityErrorCategory, message?: string, options: EntityErrorOptions = {}) {
    const taxonomy = ENTITY_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "EntityError";
    this.category = category;
    this.code = taxonomy.code;
    this.hint = options.hint;
    this.details = options.details ?? {};
    this.issues = options.issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Serialisable view used by structured logs and the serving layer. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      ...(this.hint !== undefined ? { hint: this.hint } : {}),
      details: this.details,
      ...(this.issues !== undefined ? { issues: this.issues } : {}),
    };
  }
}

/** A declared layout leaf cannot be compiled (missing kind discriminator). */
export class ConfigurationError extends EntityError {
  constructor(message?: string, options: EntityErrorOptions = {}) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

/** An entity definition violates the declaration contract. */
export class DefinitionError extends EntityError {
  constructor(message?: string, options: EntityErrorOptions = {}) {
    super("INVALID_DEFINITION", message, options);
    this.name = "DefinitionError";
  }
}

/** Identifies the unit involved in a {@link LoadFailureError}. */
export interface LoadFailureTarget {
  readonly unit: string;
  readonly file?: string;
}

/**
 * A definition unit could not be read, parsed, imported or bound to its
 * handlers. The original failure is available through `cause`.
 */
export class LoadFailureError extends EntityError {
  readonly unit: string;
  readonly file?: string;

  constructor(target: LoadFailureTarget, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("LOAD_FAILURE", `unit "${target.unit}" failed to load: ${reason}`, {
      cause,
      hint: "fix or remove the unit, or load with failureMode=isolate",
      details: { unit: target.unit, ...(target.file !== undefined ? { file: target.file } : {}) },
    });
    this.name = "LoadFailureError";
    this.unit = target.unit;
    this.file = target.file;
  }
}

/** The serving layer handed over a payload that is not a graph node. */
export class PayloadValidationError extends EntityError {
  constructor(message?: string, options: EntityErrorOptions = {}) {
    super("INVALID_PAYLOAD", message, options);
    this.name = "PayloadValidationError";
  }
}

/** Extracts a log-friendly description from an unknown thrown value. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof EntityError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
