export class EtlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EtlError";
  }
}

/**
 * Raised while loading settings or building the type rule table. The
 * pipeline must not start once this has been thrown.
 */
export class ConfigurationError extends EtlError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TrackingInputError extends EtlError {
  constructor(message: string) {
    super(message);
    this.name = "TrackingInputError";
  }
}

export class RelationNotFoundError extends EtlError {
  readonly relation: string;

  constructor(relation: string) {
    super(`Relation not found in source catalog: ${relation}`);
    this.name = "RelationNotFoundError";
    this.relation = relation;
  }
}
