import { describe, it, expect } from 'vitest';
import {
  BaseError,
  HttpRequestError,
  InvalidParamsRpcError,
  LimitExceededRpcError,
  ResourceUnavailableRpcError,
  TimeoutError,
} from 'viem';
import {
  SweepError,
  TransientRpcError,
  PermanentRpcError,
  PreconditionError,
  NoReachableEndpointError,
  DispatchFailure,
  ConfirmationTimeout,
  ValidationError,
  ErrorUtils,
} from './errors.js';

describe('Error Hierarchy', () => {
  describe('SweepError', () => {
    it('should create error with all properties', () => {
      const error = new SweepError('Test error', 'TEST_ERROR', true, { foo: 'bar' });

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.retriable).toBe(true);
      expect(error.context).toEqual({ foo: 'bar' });
      expect(error.name).toBe('SweepError');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON with a redacted context', () => {
      const error = new SweepError('Test error', 'TEST_ERROR', false, {
        account: '0x01',
        privateKey: '0xsecret',
      }, new Error('boom'));

      const json = error.toJSON();

      expect(json.name).toBe('SweepError');
      expect(json.code).toBe('TEST_ERROR');
      expect(json.retriable).toBe(false);
      expect(json.context).toEqual({ account: '0x01', privateKey: '[REDACTED]' });
      expect(json.cause).toEqual({ name: 'Error', message: 'boom' });
    });

    it('should preserve error chain with cause', () => {
      const cause = new Error('Original error');
      const error = new SweepError('Wrapper error', 'WRAPPED', false, {}, cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe('RPC errors', () => {
    it('TransientRpcError is retriable and names method and endpoint', () => {
      const error = new TransientRpcError('eth_getLogs', 'https://rpc.test', new Error('rate limit exceeded'));

      expect(error.message).toBe('eth_getLogs temporarily unavailable: rate limit exceeded');
      expect(error.code).toBe('RPC_TRANSIENT');
      expect(error.retriable).toBe(true);
      expect(error.context).toEqual({ method: 'eth_getLogs', endpoint: 'https://rpc.test' });
    });

    it('PermanentRpcError is not retriable', () => {
      const error = new PermanentRpcError('eth_call', 'https://rpc.test', new Error('execution reverted'), {
        to: '0x01',
      });

      expect(error.message).toBe('eth_call failed: execution reverted');
      expect(error.code).toBe('RPC_PERMANENT');
      expect(error.retriable).toBe(false);
      expect(error.context).toEqual({ method: 'eth_call', endpoint: 'https://rpc.test', to: '0x01' });
    });
  });

  describe('PreconditionError', () => {
    it('builds the missing-credentials failure', () => {
      const error = PreconditionError.noCredentials('keys.txt');

      expect(error.message).toBe('No usable private keys found');
      expect(error.code).toBe('PRECONDITION_NO_CREDENTIALS');
      expect(error.precondition).toBe('NO_CREDENTIALS');
      expect(error.context).toEqual({ source: 'keys.txt' });
    });

    it('builds the missing-destination failure', () => {
      expect(PreconditionError.noDestination().code).toBe('PRECONDITION_NO_DESTINATION');
    });

    it('builds the chain mismatch failure', () => {
      const error = PreconditionError.chainMismatch(8453, 1, 'https://rpc.test');

      expect(error.message).toBe('Endpoint reports chain 1, expected 8453');
      expect(error.context).toEqual({ expected: 8453, actual: 1, endpoint: 'https://rpc.test' });
    });

    it('NoReachableEndpointError lists every attempt', () => {
      const error = new NoReachableEndpointError([
        { url: 'https://a.test', error: 'down' },
        { url: 'https://b.test', error: 'down' },
      ]);

      expect(error).toBeInstanceOf(PreconditionError);
      expect(error.message).toBe('None of 2 RPC endpoints answered');
      expect(error.code).toBe('PRECONDITION_NO_REACHABLE_ENDPOINT');
      expect(error.context).toEqual({ endpoints: ['https://a.test', 'https://b.test'] });
    });

    it('NoReachableEndpointError without endpoints says none were configured', () => {
      expect(new NoReachableEndpointError([]).message).toBe('No RPC endpoints configured');
    });
  });

  describe('Dispatch errors', () => {
    it('DispatchFailure carries its stage in the code', () => {
      const error = new DispatchFailure('submit', { account: '0x01' }, new Error('insufficient funds'));

      expect(error.message).toBe('submit failed: insufficient funds');
      expect(error.code).toBe('DISPATCH_SUBMIT_FAILED');
      expect(error.stage).toBe('submit');
      expect(error.retriable).toBe(false);
    });

    it('ConfirmationTimeout names the hash and the wait', () => {
      const error = new ConfirmationTimeout('0xabc', 120000);

      expect(error.message).toBe('Transaction 0xabc not included after 120000ms');
      expect(error.code).toBe('CONFIRMATION_TIMEOUT');
    });
  });

  describe('ValidationError', () => {
    it('invalidAddress', () => {
      const error = ValidationError.invalidAddress('RECIPIENT_ADDRESS', '0x123');

      expect(error.message).toBe('Invalid address for RECIPIENT_ADDRESS: 0x123');
      expect(error.code).toBe('VALIDATION_RECIPIENT_ADDRESS_INVALID');
      expect(error.field).toBe('RECIPIENT_ADDRESS');
    });

    it('invalidPrivateKey never echoes the key', () => {
      const error = ValidationError.invalidPrivateKey(3);

      expect(error.message).toBe('Line 3 is not a 32-byte hex private key');
      expect(error.context).toEqual({ line: 3 });
    });

    it('invalidParameter', () => {
      const error = ValidationError.invalidParameter('DELAY', 'integer >= 0', 'soon');

      expect(error.message).toBe('Invalid DELAY: expected integer >= 0, got soon');
    });
  });
});

describe('ErrorUtils', () => {
  describe('isTransient', () => {
    it('follows the retriable flag of collector errors', () => {
      expect(ErrorUtils.isTransient(new TransientRpcError('eth_getLogs', 'x'))).toBe(true);
      expect(ErrorUtils.isTransient(new PermanentRpcError('eth_getLogs', 'x'))).toBe(false);
    });

    it('treats throttling HTTP statuses as transient', () => {
      for (const status of [429, 502, 503, 504]) {
        expect(ErrorUtils.isTransient(new HttpRequestError({ url: 'https://rpc.test', status }))).toBe(true);
      }
    });

    it('treats other HTTP statuses as permanent', () => {
      expect(ErrorUtils.isTransient(new HttpRequestError({ url: 'https://rpc.test', status: 400 }))).toBe(false);
    });

    it('treats limit and resource errors as transient', () => {
      expect(ErrorUtils.isTransient(new LimitExceededRpcError(new Error('limit')))).toBe(true);
      expect(ErrorUtils.isTransient(new ResourceUnavailableRpcError(new Error('busy')))).toBe(true);
    });

    it('treats invalid params as permanent', () => {
      expect(ErrorUtils.isTransient(new InvalidParamsRpcError(new Error('bad block range')))).toBe(false);
    });

    it('treats request timeouts as transient', () => {
      expect(ErrorUtils.isTransient(new TimeoutError({ body: {}, url: 'https://rpc.test' }))).toBe(true);
    });

    it('falls back to message patterns', () => {
      expect(ErrorUtils.isTransient(new Error('429 Too Many Requests'))).toBe(true);
      expect(ErrorUtils.isTransient(new Error('execution reverted'))).toBe(false);
    });
  });

  describe('toRpcError', () => {
    it('wraps transient failures', () => {
      const error = ErrorUtils.toRpcError(new Error('rate limit exceeded'), 'eth_getLogs', 'https://rpc.test');

      expect(error).toBeInstanceOf(TransientRpcError);
      expect(error.message).toBe('eth_getLogs temporarily unavailable: rate limit exceeded');
    });

    it('wraps everything else as permanent', () => {
      const error = ErrorUtils.toRpcError(new Error('execution reverted'), 'eth_call', 'https://rpc.test');

      expect(error).toBeInstanceOf(PermanentRpcError);
    });

    it('passes RPC errors through unchanged', () => {
      const original = new PermanentRpcError('eth_call', 'https://rpc.test');

      expect(ErrorUtils.toRpcError(original, 'eth_call', 'https://other.test')).toBe(original);
    });
  });

  describe('describe', () => {
    it('prefers the short message of viem errors', () => {
      expect(ErrorUtils.describe(new BaseError('Short summary', { details: 'long details' }))).toBe('Short summary');
    });

    it('handles strings and unknown values', () => {
      expect(ErrorUtils.describe('plain')).toBe('plain');
      expect(ErrorUtils.describe(42)).toBe('42');
    });
  });

  describe('sanitizeContext', () => {
    it('redacts sensitive keys at any depth and stringifies bigints', () => {
      const sanitized = ErrorUtils.sanitizeContext({
        account: '0x01',
        privateKey: '0xsecret',
        nested: { apiKey: 'k', block: 5n },
      });

      expect(sanitized).toEqual({
        account: '0x01',
        privateKey: '[REDACTED]',
        nested: { apiKey: '[REDACTED]', block: '5' },
      });
    });
  });
});
