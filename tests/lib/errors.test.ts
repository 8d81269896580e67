import { AppError, errorEnvelope, errorMessage } from '../../src/lib/errors.js';

describe('errors', () => {
  it('maps codes to HTTP statuses', () => {
    expect(new AppError('VALIDATION_FAILED', 'bad').httpStatus).toBe(400);
    expect(new AppError('RATE_LIMIT_EXCEEDED', 'slow down').httpStatus).toBe(429);
    expect(new AppError('EXTERNAL_SERVICE_ERROR', 'upstream').httpStatus).toBe(502);
    expect(new AppError('PAYLOAD_TOO_LARGE', 'too big').httpStatus).toBe(413);
  });

  it('serializes to the envelope, omitting absent fields', () => {
    const envelope = new AppError('NOT_FOUND', 'missing').toJSON();
    expect(Object.keys(envelope)).toEqual(['error', 'message', 'timestamp']);
    expect(envelope).toMatchObject({ error: 'NOT_FOUND', message: 'missing' });
  });

  it('carries details and retryAfter', () => {
    expect(errorEnvelope('RATE_LIMIT_EXCEEDED', 'slow down', { limitClass: 'check' }, 7)).toMatchObject({
      error: 'RATE_LIMIT_EXCEEDED',
      details: { limitClass: 'check' },
      retryAfter: 7,
    });
  });

  it('reads messages from errors and anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
