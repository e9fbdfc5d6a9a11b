import { ArgumentsHost, BadRequestException, HttpException, HttpStatus, NotFoundException } from '@nestjs/common';

import { DirectoryExceptionFilter } from './directory-exception.filter';
import {
  DirectoryObjectNotFoundError,
  DirectoryRequestError,
} from '../../../domain/directory/directory-errors';
import { AppLogger } from '../../logging/app-logger.service';
import { LogLevel } from '../../logging/log-levels';

describe('DirectoryExceptionFilter', () => {
  let filter: DirectoryExceptionFilter;
  let logger: AppLogger;
  let mockResponse: {
    status: jest.Mock;
    setHeader: jest.Mock;
    json: jest.Mock;
  };
  let mockHost: ArgumentsHost;

  beforeEach(() => {
    logger = new AppLogger();
    logger.setGlobalLevel(LogLevel.OFF);
    filter = new DirectoryExceptionFilter(logger);
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      setHeader: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
    mockHost = {
      switchToHttp: () => ({
        getResponse: () => mockResponse,
        getRequest: () => ({}),
      }),
    } as unknown as ArgumentsHost;
  });

  const sentBody = (): unknown => mockResponse.json.mock.calls[0][0];

  it('should render NotFoundException as a 404 envelope', () => {
    filter.catch(new NotFoundException('Group g-1 not found.'), mockHost);

    expect(mockResponse.status).toHaveBeenCalledWith(404);
    expect(mockResponse.setHeader).toHaveBeenCalledWith('Content-Type', 'application/json; charset=utf-8');
    expect(sentBody()).toEqual({ status: '404', error: 'Not Found', detail: 'Group g-1 not found.' });
  });

  it('should join validation message arrays', () => {
    filter.catch(new BadRequestException(['format must be json', 'limit must be a number']), mockHost);

    expect(sentBody()).toEqual({
      status: '400',
      error: 'Bad Request',
      detail: 'format must be json; limit must be a number',
    });
  });

  it('should use a plain string response body as detail', () => {
    filter.catch(new HttpException('Slow down', HttpStatus.TOO_MANY_REQUESTS), mockHost);

    expect(sentBody()).toEqual({ status: '429', error: 'Too Many Requests', detail: 'Slow down' });
  });

  it('should map DirectoryRequestError to 502', () => {
    filter.catch(new DirectoryRequestError('Insufficient privileges.', 403), mockHost);

    expect(mockResponse.status).toHaveBeenCalledWith(502);
    expect(sentBody()).toEqual({
      status: '502',
      error: 'Bad Gateway',
      detail: 'Directory request failed: Insufficient privileges.',
    });
  });

  it('should map an escaped member not-found to 502', () => {
    filter.catch(new DirectoryObjectNotFoundError('device', 'd-1'), mockHost);

    expect(sentBody()).toEqual({
      status: '502',
      error: 'Bad Gateway',
      detail: 'Directory device d-1 not found while resolving membership',
    });
  });

  it('should hide the message of unexpected errors', () => {
    const errorSpy = jest.spyOn(logger, 'error');

    filter.catch(new Error('db password leaked'), mockHost);

    expect(sentBody()).toEqual({ status: '500', error: 'Internal Server Error', detail: 'Internal server error' });
    expect(errorSpy).toHaveBeenCalledWith('general', 'Unhandled exception', expect.any(Error));
  });
});
