import { describe, it, expect } from 'vitest';
import {
  DecodeError,
  GraphBridgeError,
  GraphBridgeErrorCode,
  ResourceError,
  SchemaMismatchError,
  ValidationError,
  toError,
} from '../../src/utils/errors.js';

describe('GraphBridgeError taxonomy', () => {
  it('keeps subclass identity and codes', () => {
    const decode = new DecodeError('Malformed agtype object', '{"a":}');
    const mismatch = new SchemaMismatchError('unknown key', 'weight', { keys: ['label', 'weight'] });

    expect(decode).toBeInstanceOf(GraphBridgeError);
    expect(decode).toBeInstanceOf(Error);
    expect(decode.name).toBe('DecodeError');
    expect(decode.code).toBe(GraphBridgeErrorCode.DECODE_ERROR);
    expect(decode.details).toEqual({ text: '{"a":}' });
    expect(mismatch.details).toEqual({ key: 'weight', keys: ['label', 'weight'] });
    expect(mismatch.component).toBe('GraphRecord');
  });

  it('serializes to a plain object with the cause message', () => {
    const error = new ResourceError('Failed to open', new Error('ECONNREFUSED'), { attempt: 1 }, 'SessionFactory');
    const plain = error.toPlainObject();

    expect(plain).toMatchObject({
      name: 'ResourceError',
      message: 'Failed to open',
      code: 'RESOURCE_ERROR',
      details: { attempt: 1 },
      component: 'SessionFactory',
      cause: 'ECONNREFUSED',
    });
    expect(JSON.parse(JSON.stringify(error))).toEqual(plain);
  });

  it('wraps foreign errors and passes taxonomy errors through', () => {
    const validation = new ValidationError('bad');
    expect(GraphBridgeError.wrap(validation, GraphBridgeErrorCode.INTERNAL_ERROR)).toBe(validation);

    const wrapped = GraphBridgeError.wrap(new TypeError('nope'), GraphBridgeErrorCode.INTERNAL_ERROR, 'Decoder crashed');
    expect(wrapped.message).toBe('Decoder crashed: nope');
    expect(wrapped.code).toBe(GraphBridgeErrorCode.INTERNAL_ERROR);
    expect(wrapped.cause).toBeInstanceOf(TypeError);
  });

  it('ResourceError.from prefixes the reason once', () => {
    const first = ResourceError.from('timeout', 'Failed to create engine');
    expect(first.message).toBe('Failed to create engine: timeout');
    expect(ResourceError.from(first, 'Outer')).toBe(first);
  });

  it('toError normalizes thrown values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
  });
});
