import { describe, it, expect } from 'vitest';
import {
  CorruptionError,
  LockTimeoutError,
  NotFoundError,
  StateError,
  toErrorPayload,
  withAction,
} from '../../src/types/errors.js';

describe('withAction', () => {
  it('StateError にアクション名を付与する', () => {
    const err = withAction(new NotFoundError('nothing here'), 'load');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.action).toBe('load');
  });

  it('既に付与済みのアクション名は上書きしない', () => {
    const err = withAction(withAction(new NotFoundError('x'), 'watch'), 'load');
    expect(err.action).toBe('watch');
  });

  it('StateError 以外は INTERNAL_ERROR で包む', () => {
    const cause = new TypeError('boom');
    const err = withAction(cause, 'save');
    expect(err).toBeInstanceOf(StateError);
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.message).toBe('save failed: boom');
    expect(err.cause).toBe(cause);
  });
});

describe('toErrorPayload', () => {
  it('code / message / action / details を返す', () => {
    const err = withAction(new CorruptionError('/tmp/s.json', 'bad file'), 'load');
    expect(toErrorPayload(err)).toEqual({
      code: 'CORRUPT_STATE',
      message: 'bad file',
      action: 'load',
      details: { filePath: '/tmp/s.json' },
    });
  });

  it('details が空なら省略する', () => {
    expect(toErrorPayload(new StateError('X', 'msg'))).toEqual({ code: 'X', message: 'msg' });
  });

  it('Error 以外の値も INTERNAL_ERROR にする', () => {
    expect(toErrorPayload('oops')).toEqual({ code: 'INTERNAL_ERROR', message: 'oops' });
  });
});

describe('LockTimeoutError', () => {
  it('リトライ可能な LOCK_TIMEOUT', () => {
    const err = new LockTimeoutError('/tmp/s.json.lock', 100);
    expect(err.code).toBe('LOCK_TIMEOUT');
    expect(err.retryable).toBe(true);
    expect(err.message).toBe('Timed out after 100ms waiting for state lock /tmp/s.json.lock');
  });
});
