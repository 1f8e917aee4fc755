import type { Article, EnrichmentErrorKind } from '../../shared/types';

export class EnrichmentError extends Error {
  constructor(
    readonly kind: EnrichmentErrorKind,
    message: string,
    readonly url?: string,
  ) {
    super(message);
    this.name = kind;
  }
}

export const isEnrichmentError = (error: unknown): error is EnrichmentError => error instanceof EnrichmentError;

/** Raised when a whole batch produced nothing usable. Distinct from partial success. */
export class BatchFailedError extends Error {
  constructor(
    message: string,
    readonly attempted: number,
    readonly degraded: number,
    readonly articles: Article[] = [],
  ) {
    super(message);
    this.name = 'BatchFailedError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
