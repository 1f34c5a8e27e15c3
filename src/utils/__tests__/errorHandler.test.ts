import { ApiError, AuthError, ConfigurationError, ErrorCode, TransportError } from '../../models';
import { extractErrorInfo, generateRequestId, isRetryableError, toError } from '../errorHandler';

describe('errorHandler', () => {
  describe('extractErrorInfo', () => {
    it('should treat server-side API errors as retryable', () => {
      expect(extractErrorInfo(new ApiError(503, 'busy'))).toEqual({
        code: ErrorCode.CRAFTY_API_ERROR,
        message: 'HTTP 503: busy',
        status: 503,
        isRetryable: true
      });
      expect(extractErrorInfo(new ApiError(404, 'missing')).isRetryable).toBe(false);
    });

    it('should never retry authentication failures', () => {
      expect(extractErrorInfo(new AuthError('Login failed 401: denied', 401))).toEqual({
        code: ErrorCode.CRAFTY_AUTH_FAILED,
        message: 'Login failed 401: denied',
        status: 401,
        isRetryable: false
      });
    });

    it('should map transport errors by timeout flag', () => {
      expect(extractErrorInfo(new TransportError('timed out', true)).code).toBe(ErrorCode.REQUEST_TIMEOUT);
      expect(extractErrorInfo(new TransportError('refused', false))).toEqual({
        code: ErrorCode.SERVICE_UNAVAILABLE,
        message: 'refused',
        isRetryable: true
      });
    });

    it('should keep the code of other application errors', () => {
      expect(extractErrorInfo(new ConfigurationError('bad config')).code).toBe(ErrorCode.INVALID_CONFIGURATION);
    });

    it('should handle unknown values', () => {
      expect(extractErrorInfo('oops')).toEqual({
        code: ErrorCode.INTERNAL_SERVER_ERROR,
        message: 'oops',
        isRetryable: false
      });
    });
  });

  it('should only retry unavailable and timed out services', () => {
    expect(isRetryableError(ErrorCode.SERVICE_UNAVAILABLE)).toBe(true);
    expect(isRetryableError(ErrorCode.REQUEST_TIMEOUT)).toBe(true);
    expect(isRetryableError(ErrorCode.CRAFTY_API_ERROR)).toBe(false);
  });

  it('should wrap non-errors', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });

  it('should generate distinct request ids', () => {
    const first = generateRequestId();
    expect(first).toMatch(/^req_\d+_[a-z0-9]+$/);
    expect(generateRequestId()).not.toBe(first);
  });
});
