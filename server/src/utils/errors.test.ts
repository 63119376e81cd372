import { Request, Response } from 'express';
import {
  AppError,
  ConfigurationError,
  ServiceControlError,
  asyncHandler,
  describeRequestError,
  errorHandler,
  errorMessage,
} from './errors';

// Mock logger to suppress output during tests
jest.mock('./logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function createMockResponse(): Partial<Response> {
  return {
    status: jest.fn().mockReturnThis(),
    json: jest.fn().mockReturnThis(),
  };
}

describe('Error classes', () => {
  describe('AppError', () => {
    it('should carry its message and class name', () => {
      const error = new AppError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('ConfigurationError', () => {
    it('should include the field name', () => {
      const error = new ConfigurationError('interval_seconds must be a number', 'interval_seconds');
      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.name).toBe('ConfigurationError');
      expect(error.field).toBe('interval_seconds');
    });

    it('should leave the field undefined when not given', () => {
      expect(new ConfigurationError('bad').field).toBeUndefined();
    });
  });

  describe('ServiceControlError', () => {
    it('should prefix the message with the command', () => {
      const error = new ServiceControlError('install', 'permission denied');
      expect(error.message).toBe('service install failed: permission denied');
      expect(error.command).toBe('install');
      expect(error).toBeInstanceOf(AppError);
    });
  });
});

describe('errorMessage', () => {
  it('should use the message of an Error', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('describeRequestError', () => {
  function fetchFailed(cause: unknown): TypeError {
    return new TypeError('fetch failed', { cause });
  }

  function socketError(code: string, message: string): Error {
    return Object.assign(new Error(message), { code });
  }

  it.each([
    ['ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:80', 'Connection refused'],
    ['ECONNRESET', 'read ECONNRESET', 'Connection reset'],
    ['ETIMEDOUT', 'connect ETIMEDOUT 10.0.0.1:443', 'Connection timed out'],
    ['ENOTFOUND', 'getaddrinfo ENOTFOUND api.example.com', 'DNS lookup failed'],
    ['EAI_AGAIN', 'getaddrinfo EAI_AGAIN api.example.com', 'DNS lookup failed'],
    ['EHOSTUNREACH', 'connect EHOSTUNREACH 10.0.0.1:80', 'Host unreachable'],
    ['UND_ERR_SOCKET', 'other side closed', 'Connection closed by server'],
  ])('should describe a %s cause', (code, message, expected) => {
    expect(describeRequestError(fetchFailed(socketError(code, message)))).toBe(expected);
  });

  it('should describe certificate failures', () => {
    const cause = socketError('UNABLE_TO_VERIFY_LEAF_SIGNATURE', 'unable to verify the first certificate');
    expect(describeRequestError(fetchFailed(cause))).toBe('TLS certificate error');
  });

  it('should match a code on the error itself', () => {
    expect(describeRequestError(socketError('ECONNRESET', 'socket closed'))).toBe('Connection reset');
  });

  it('should fall back to the cause message', () => {
    expect(describeRequestError(fetchFailed(new Error('socket hang up')))).toBe('socket hang up');
  });

  it('should fall back to the error message without a cause', () => {
    expect(describeRequestError(new Error('invalid redirect'))).toBe('invalid redirect');
    expect(describeRequestError('plain failure')).toBe('plain failure');
  });
});

describe('errorHandler', () => {
  it('should respond 500 without leaking the message', () => {
    const mockRes = createMockResponse();
    const mockReq: Partial<Request> = { method: 'GET', path: '/metrics' };

    errorHandler(new Error('registry exploded'), mockReq as Request, mockRes as Response, jest.fn());

    expect(mockRes.status).toHaveBeenCalledWith(500);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Internal server error' });
  });
});

describe('asyncHandler', () => {
  it('should forward rejections to next', async () => {
    const error = new Error('async failure');
    const next = jest.fn();
    const handler = asyncHandler(async () => {
      throw error;
    });

    handler({} as Request, {} as Response, next);
    await new Promise(resolve => setImmediate(resolve));

    expect(next).toHaveBeenCalledWith(error);
  });

  it('should not call next when the handler succeeds', async () => {
    const next = jest.fn();
    const handler = asyncHandler(async () => 'done');

    handler({} as Request, {} as Response, next);
    await new Promise(resolve => setImmediate(resolve));

    expect(next).not.toHaveBeenCalled();
  });
});
