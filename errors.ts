export type GenerationFailureKind = 'timeout' | 'service' | 'malformed';

export class GenerationError extends Error {
  constructor(
    readonly kind: GenerationFailureKind,
    message: string,
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class ReportDeliveryError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ReportDeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
