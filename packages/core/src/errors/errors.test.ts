import { describe, it, expect } from 'vitest';
import {
  RelgateError,
  RelgateErrorCode,
  ConfigError,
  AnalysisError,
  PipelineError,
  getErrorMessage,
} from './index.js';

describe('RelgateError', () => {
  it('should create error with all properties', () => {
    const error = new RelgateError(
      'Test error',
      RelgateErrorCode.EMPTY_BATCH,
      { field: 'test' },
      'high',
      false,
    );

    expect(error.message).toBe('Test error');
    expect(error.code).toBe(RelgateErrorCode.EMPTY_BATCH);
    expect(error.context).toEqual({ field: 'test' });
    expect(error.severity).toBe('high');
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('RelgateError');
  });

  it('should create error with defaults', () => {
    const error = new RelgateError('Test error', RelgateErrorCode.STAGE_FAILED);

    expect(error.context).toBeUndefined();
    expect(error.severity).toBe('medium');
    expect(error.isRecoverable()).toBe(true);
  });

  it('should serialize to JSON correctly', () => {
    const error = new RelgateError(
      'Test error',
      RelgateErrorCode.STAGE_FAILED,
      { path: '/test/path' },
      'high',
      false,
    );

    expect(error.toJSON()).toEqual({
      error: 'Test error',
      code: 'STAGE_FAILED',
      severity: 'high',
      recoverable: false,
      context: { path: '/test/path' },
    });
  });
});

describe('ConfigError', () => {
  it('is not recoverable and uses the config code', () => {
    const error = new ConfigError('bad config', { source: 'x.yml' });
    expect(error.code).toBe(RelgateErrorCode.CONFIG_INVALID);
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('ConfigError');
  });
});

describe('AnalysisError', () => {
  it('carries the file in both the property and the context', () => {
    const error = new AnalysisError('boom', 'src/app.py', { language: 'Python' });
    expect(error.file).toBe('src/app.py');
    expect(error.context).toEqual({ language: 'Python', file: 'src/app.py' });
    expect(error.recoverable).toBe(true);
  });
});

describe('PipelineError', () => {
  it('prefixes the message with the stage', () => {
    const error = new PipelineError('no files to analyze', 'input', {
      code: RelgateErrorCode.EMPTY_BATCH,
    });
    expect(error.message).toBe('[input] no files to analyze');
    expect(error.stage).toBe('input');
    expect(error.code).toBe(RelgateErrorCode.EMPTY_BATCH);
    expect(error.severity).toBe('critical');
    expect(error.recoverable).toBe(false);
  });

  it('records the cause message and file in the context', () => {
    const error = new PipelineError('assessment threw', 'risk-assessment', {
      file: 'a.ts',
      cause: new Error('inner'),
    });
    expect(error.code).toBe(RelgateErrorCode.STAGE_FAILED);
    expect(error.context).toEqual({ stage: 'risk-assessment', file: 'a.ts', cause: 'inner' });
  });
});

describe('getErrorMessage', () => {
  it('handles errors and unknown values', () => {
    expect(getErrorMessage(new Error('disk gone'))).toBe('disk gone');
    expect(getErrorMessage(42)).toBe('42');
  });
});
