import { ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import {
  ConfigurationException,
  ConnectionException,
  InvalidIdentifierException,
  TableNotFoundException,
  ValidationException,
} from '../exceptions/etl.exceptions';
import { HttpExceptionFilter } from './http-exception.filter';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let mockResponse: { code: jest.Mock; send: jest.Mock };
  let mockRequest: { url: string; method: string };
  let mockHost: ArgumentsHost;

  const sentBody = () => mockResponse.send.mock.calls[0][0];

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    filter = new HttpExceptionFilter();

    mockResponse = {
      code: jest.fn().mockReturnThis(),
      send: jest.fn().mockReturnThis(),
    };
    mockRequest = { url: '/api/processing/run', method: 'POST' };

    mockHost = {
      switchToHttp: () => ({
        getResponse: () => mockResponse,
        getRequest: () => mockRequest,
      }),
    } as ArgumentsHost;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('HttpException handling', () => {
    it('should map the status to a standard code', () => {
      filter.catch(new HttpException('Test error', HttpStatus.BAD_REQUEST), mockHost);

      expect(mockResponse.code).toHaveBeenCalledWith(400);
      expect(mockResponse.send).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: 400,
          code: 'BAD_REQUEST',
          message: 'Test error',
          path: '/api/processing/run',
        }),
      );
    });

    it.each([
      [HttpStatus.NOT_FOUND, 'NOT_FOUND'],
      [HttpStatus.PAYLOAD_TOO_LARGE, 'PAYLOAD_TOO_LARGE'],
      [HttpStatus.UNPROCESSABLE_ENTITY, 'UNPROCESSABLE_ENTITY'],
      [HttpStatus.SERVICE_UNAVAILABLE, 'SERVICE_UNAVAILABLE'],
      [HttpStatus.PRECONDITION_FAILED, 'ERROR'],
    ])('should map status %p to %p', (status, code) => {
      filter.catch(new HttpException('x', status), mockHost);

      expect(sentBody()).toMatchObject({ statusCode: status, code });
    });

    it('should join message arrays', () => {
      filter.catch(
        new HttpException({ message: ['limit must be positive', 'page is required'] }, 400),
        mockHost,
      );

      expect(sentBody().message).toBe('limit must be positive; page is required');
    });

    it('should pass validation errors through as details', () => {
      const errors = [{ path: ['targetTable'], message: 'Required' }];
      filter.catch(new HttpException({ message: 'Validation failed', errors }, 400), mockHost);

      expect(sentBody()).toMatchObject({ message: 'Validation failed', details: errors });
    });

    it('should omit details when none are given', () => {
      filter.catch(new HttpException('Simple error', HttpStatus.BAD_REQUEST), mockHost);

      expect(sentBody().details).toBeUndefined();
      expect(sentBody().timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });
  });

  describe('domain exceptions', () => {
    it('should keep the code of a configuration failure', () => {
      filter.catch(new ConfigurationException("No mappings found for target table 'claims'"), mockHost);

      expect(mockResponse.code).toHaveBeenCalledWith(422);
      expect(sentBody()).toMatchObject({
        statusCode: 422,
        code: 'CONFIGURATION_ERROR',
        message: "No mappings found for target table 'claims'",
      });
    });

    it('should keep the code and details of a validation failure', () => {
      filter.catch(
        new ValidationException('The following columns are missing in the spreadsheet: amt', {
          missingColumns: ['amt'],
        }),
        mockHost,
      );

      expect(sentBody()).toMatchObject({
        statusCode: 400,
        code: 'VALIDATION_ERROR',
        details: { missingColumns: ['amt'] },
      });
    });

    it('should report missing tables as 404', () => {
      filter.catch(new TableNotFoundException('claims'), mockHost);

      expect(sentBody()).toMatchObject({
        statusCode: 404,
        code: 'TABLE_NOT_FOUND',
        message: "Table 'claims' does not exist",
        details: { tableName: 'claims' },
      });
    });

    it('should report rejected identifiers', () => {
      filter.catch(new InvalidIdentifierException('a-b', 'column'), mockHost);

      expect(sentBody()).toMatchObject({ code: 'INVALID_IDENTIFIER', message: "Invalid column name 'a-b'" });
    });

    it('should log store outages as errors', () => {
      filter.catch(new ConnectionException('ECONNREFUSED'), mockHost);

      expect(sentBody()).toMatchObject({
        statusCode: 503,
        code: 'STORE_UNAVAILABLE',
        message: 'Failed to connect to database: ECONNREFUSED',
      });
      expect(Logger.prototype.error).toHaveBeenCalled();
      expect(Logger.prototype.warn).not.toHaveBeenCalled();
    });
  });

  describe('Generic Error handling', () => {
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
      process.env.NODE_ENV = originalEnv;
    });

    it('should expose the stack outside production', () => {
      process.env.NODE_ENV = 'development';

      filter.catch(new Error('Something went wrong'), mockHost);

      expect(mockResponse.code).toHaveBeenCalledWith(500);
      expect(sentBody()).toMatchObject({
        statusCode: 500,
        code: 'INTERNAL_ERROR',
        message: 'Something went wrong',
        details: expect.stringContaining('Error: Something went wrong'),
      });
    });

    it('should not expose stack traces in production', () => {
      process.env.NODE_ENV = 'production';

      filter.catch(new Error('Something went wrong'), mockHost);

      expect(sentBody().details).toBeUndefined();
    });

    it('should handle unknown exception types', () => {
      filter.catch({ some: 'unknown error' }, mockHost);

      expect(sentBody()).toMatchObject({
        statusCode: 500,
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      });
    });
  });
});
