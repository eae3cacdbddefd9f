import { HttpStatus } from '@nestjs/common';

/** Base class for failures the caller can act on */
export abstract class ReportError extends Error {
  abstract readonly code: string;
  abstract readonly status: HttpStatus;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A section failed structural or referential validation */
export class ReportValidationError extends ReportError {
  readonly code = 'REPORT_VALIDATION_ERROR';
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(
    readonly sectionTitle: string,
    readonly problem: string,
  ) {
    super(`Section "${sectionTitle}" is invalid: ${problem}`);
  }
}

/** No renderer is registered for the requested format */
export class RendererNotFoundError extends ReportError {
  readonly code = 'RENDERER_NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(
    readonly format: string,
    readonly available: readonly string[],
  ) {
    super(`No renderer for format "${format}" (available: ${available.join(', ')})`);
  }
}

export class DataSourceNotFoundError extends ReportError {
  readonly code = 'DATA_SOURCE_NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(readonly sourcePath: string) {
    super(`Data source not found: ${sourcePath}`);
  }
}

/** The data source exists but its content cannot be used */
export class DataSourceFormatError extends ReportError {
  readonly code = 'DATA_SOURCE_FORMAT_ERROR';
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(
    readonly sourcePath: string,
    reason: string,
  ) {
    super(`Data source ${sourcePath} is not usable: ${reason}`);
  }
}
