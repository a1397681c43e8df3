/**
 * Error taxonomy for the yield advisor
 * ValidationError lives beside the validators in ./validation
 */

export class ResourceNotFoundError extends Error {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`);
    this.name = 'ResourceNotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

export class ExternalServiceError extends Error {
  readonly serviceName: string;

  constructor(message: string, serviceName: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ExternalServiceError';
    this.serviceName = serviceName;
  }
}

/**
 * Wraps any unexpected failure inside the scoring pipeline
 */
export class PredictionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'PredictionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
