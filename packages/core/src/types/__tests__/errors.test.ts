import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy
 */

import {
  RecordGenError,
  RecordConstructionError,
  ConstructionMismatchError,
  TypeArgumentError,
  GenerationError,
  ConfigError,
  isRecordGenError,
} from '../errors';
import { ErrorCode } from '../../errors/codes';

describe('Error Hierarchy', () => {
  describe('RecordGenError base class', () => {
    class TestError extends RecordGenError {
      constructor(message: string) {
        super({ message, errorCode: ErrorCode.INTERNAL_ERROR });
      }
    }

    it('creates error with params object', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps context and cause', () => {
      const cause = new Error('root cause');
      const error = new RecordConstructionError({
        message: 'Higher level',
        context: { recordName: 'HypRecord', field: 'a' },
        cause,
      });

      expect(error.context).toEqual({ recordName: 'HypRecord', field: 'a' });
      expect(error.cause).toBe(cause);
      expect(error.recordName).toBe('HypRecord');
    });

    it('serializes differently for dev and prod', () => {
      const error = new GenerationError({
        message: 'Serialize me',
        cause: new TypeError('inner'),
      });

      const devJson = error.toJSON('dev');
      const prodJson = error.toJSON('prod');

      expect(devJson.stack).toBeDefined();
      expect(prodJson.stack).toBeUndefined();
      expect(prodJson).toEqual({
        name: 'GenerationError',
        message: 'Serialize me',
        errorCode: ErrorCode.INTERNAL_ERROR,
        severity: 'error',
        context: undefined,
        cause: { name: 'TypeError', message: 'inner' },
      });
    });
  });

  describe('default codes', () => {
    it('assigns one code per error class', () => {
      expect(
        new RecordConstructionError({
          message: 'x',
          context: { recordName: 'R' },
        }).errorCode
      ).toBe(ErrorCode.CONSTRUCTION_FAILED);
      expect(
        new TypeArgumentError({ message: 'x', context: { parameters: [] } })
          .errorCode
      ).toBe(ErrorCode.TYPE_ARGUMENT_MISMATCH);
      expect(new GenerationError({ message: 'x' }).errorCode).toBe(
        ErrorCode.INTERNAL_ERROR
      );
      expect(
        new ConfigError({ message: 'x', context: { setting: 'maxFields' } })
          .errorCode
      ).toBe(ErrorCode.CONFIGURATION_ERROR);
    });

    it('lets callers override the code', () => {
      const error = new GenerationError({
        message: 'x',
        errorCode: ErrorCode.EXTRA_KEY_COLLISION,
      });
      expect(error.errorCode).toBe('E100');
    });
  });

  describe('ConstructionMismatchError', () => {
    const error = new ConstructionMismatchError({
      recordName: 'HypRecord',
      expected: ['a', 'b', 'c'],
      actual: ['a', 'c'],
    });

    it('reports both name lists', () => {
      expect(error.message).toBe(
        'Record type HypRecord declares 2 field(s), expected 3'
      );
      expect(error.errorCode).toBe(ErrorCode.CONSTRUCTION_MISMATCH);
      expect(error.expected).toEqual(['a', 'b', 'c']);
      expect(error.actual).toEqual(['a', 'c']);
      expect(error.context).toEqual({
        recordName: 'HypRecord',
        expected: ['a', 'b', 'c'],
        actual: ['a', 'c'],
      });
    });

    it('lists the missing names', () => {
      expect(error.missing).toEqual(['b']);
    });

    it('is a RecordConstructionError', () => {
      expect(error).toBeInstanceOf(RecordConstructionError);
      expect(error.name).toBe('ConstructionMismatchError');
    });
  });

  describe('ConfigError', () => {
    it('exposes the offending setting', () => {
      const error = new ConfigError({
        message: 'bad',
        context: { setting: 'extraKeyLength', value: 0 },
      });
      expect(error.setting).toBe('extraKeyLength');
    });
  });

  describe('isRecordGenError', () => {
    it('recognizes the hierarchy only', () => {
      expect(isRecordGenError(new GenerationError({ message: 'x' }))).toBe(
        true
      );
      expect(isRecordGenError(new Error('x'))).toBe(false);
      expect(isRecordGenError('x')).toBe(false);
    });
  });
});
