import {
  BadRequestException,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Thrown when the store cannot hand out a connection. Aborts the whole operation.
 */
export class ConnectionException extends ServiceUnavailableException {
  constructor(reason: string) {
    super({
      code: 'STORE_UNAVAILABLE',
      message: `Failed to connect to database: ${reason}`,
    });
  }
}

/**
 * Missing or inconsistent mapping metadata. Raised before any row is processed.
 */
export class ConfigurationException extends UnprocessableEntityException {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'CONFIGURATION_ERROR',
      message,
      details,
    });
  }
}

/**
 * An uploaded sheet lacks something the operation cannot do without.
 */
export class ValidationException extends BadRequestException {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'VALIDATION_ERROR',
      message,
      details,
    });
  }
}

export class TableNotFoundException extends NotFoundException {
  constructor(readonly tableName: string) {
    super({
      code: 'TABLE_NOT_FOUND',
      message: `Table '${tableName}' does not exist`,
      details: { tableName },
    });
  }
}

export class InvalidIdentifierException extends BadRequestException {
  constructor(identifier: string, kind: 'table' | 'column') {
    super({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid ${kind} name '${identifier}'`,
      details: { identifier, kind },
    });
  }
}
