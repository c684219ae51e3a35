/**
 * Error types raised by the segmentation runner.
 */

export type SegmenterErrorCode =
  | 'UNKNOWN_ALGORITHM'
  | 'UNSUPPORTED_CAPABILITY'
  | 'DUPLICATE_ALGORITHM'
  | 'CONFIGURATION'
  | 'MISSING_ANNOTATION'
  | 'ANNOTATION_FORMAT'
  | 'MISSING_REFERENCE'
  | 'INVALID_ESTIMATE'
  | 'ANALYZER_REQUEST'
  | 'DATASET';

export type AlgorithmCapability = 'boundaries' | 'labels';

export class SegmenterError extends Error {
  code: SegmenterErrorCode;

  constructor(message: string, code: SegmenterErrorCode) {
    super(message);
    this.name = 'SegmenterError';
    this.code = code;
  }
}

export class UnknownAlgorithmError extends SegmenterError {
  constructor(readonly algorithmId: string) {
    super(`Unknown algorithm "${algorithmId}"`, 'UNKNOWN_ALGORITHM');
    this.name = 'UnknownAlgorithmError';
  }
}

export class UnsupportedCapabilityError extends SegmenterError {
  constructor(
    readonly algorithmId: string,
    readonly capability: AlgorithmCapability,
  ) {
    super(
      capability === 'boundaries'
        ? `Algorithm ${algorithmId} can not identify boundaries!`
        : `Algorithm ${algorithmId} can not label segments!`,
      'UNSUPPORTED_CAPABILITY',
    );
    this.name = 'UnsupportedCapabilityError';
  }
}

export class DuplicateAlgorithmError extends SegmenterError {
  constructor(readonly algorithmId: string) {
    super(`Algorithm "${algorithmId}" is already registered`, 'DUPLICATE_ALGORITHM');
    this.name = 'DuplicateAlgorithmError';
  }
}

export class ConfigurationError extends SegmenterError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/** Annotation file required for annotated-beat processing does not exist. */
export class MissingAnnotationError extends SegmenterError {
  constructor(readonly annotationPath: string) {
    super(`Annotation not found in ${annotationPath}`, 'MISSING_ANNOTATION');
    this.name = 'MissingAnnotationError';
  }
}

export class AnnotationFormatError extends SegmenterError {
  constructor(readonly annotationPath: string, detail: string) {
    super(`Invalid annotation ${annotationPath}: ${detail}`, 'ANNOTATION_FORMAT');
    this.name = 'AnnotationFormatError';
  }
}

export class MissingReferenceError extends SegmenterError {
  constructor(readonly referencePath: string) {
    super(`Reference not found in ${referencePath}`, 'MISSING_REFERENCE');
    this.name = 'MissingReferenceError';
  }
}

export class InvalidEstimateError extends SegmenterError {
  constructor(message: string) {
    super(message, 'INVALID_ESTIMATE');
    this.name = 'InvalidEstimateError';
  }
}

export class AnalyzerRequestError extends SegmenterError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message, 'ANALYZER_REQUEST');
    this.name = 'AnalyzerRequestError';
  }
}

export class DatasetError extends SegmenterError {
  constructor(message: string) {
    super(message, 'DATASET');
    this.name = 'DatasetError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
