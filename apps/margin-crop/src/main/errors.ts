export class CropConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CropConfigurationError";
  }
}

export class BoundingBoxExtractionError extends Error {
  readonly pageIndex: number | null;
  readonly attempts: number;

  constructor(message: string, options: { pageIndex?: number; attempts?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "BoundingBoxExtractionError";
    this.pageIndex = options.pageIndex ?? null;
    this.attempts = options.attempts ?? 1;
  }
}

export class CropCancelledError extends Error {
  constructor() {
    super("Crop run cancelled");
    this.name = "CropCancelledError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
