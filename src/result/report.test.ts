// Tests for error reports

import { describe, it, expect } from 'vitest';
import { resultFor, Result } from './result.js';
import { validate } from './validation.js';
import { formatErrors, parseErrorReport, toErrorReport } from './report.js';
import { ReportFormatError } from '../core/errors.js';

const failed = () => false;

describe('toErrorReport', () => {
  it('should mark a result without errors as valid', () => {
    expect(toErrorReport(Result.as('ok'))).toEqual({ valid: true, errors: [] });
  });

  it('should list the errors in order', () => {
    const result = resultFor<string>('sku').validateAll(
      validate(failed, 'sku is required'),
      validate(failed, 'sku must be uppercase', 'ab-1')
    );

    expect(toErrorReport(result)).toEqual({
      valid: false,
      errors: [
        { message: 'sku is required', actualValue: null },
        { message: 'sku must be uppercase', actualValue: 'ab-1' }
      ]
    });
  });
});

describe('toErrorReport with object actual values', () => {
  it('should render a parsed query string object', () => {
    const query: Record<string, string> = Object.create(null);
    query.age = '-1';
    const result = resultFor<string>('query').ensure(failed, 'bad query', query);

    expect(toErrorReport(result)).toEqual({
      valid: false,
      errors: [{ message: 'bad query', actualValue: '[object Object]' }]
    });
    expect(formatErrors(result)).toBe('{"message":"bad query","actualValue":"[object Object]"}');
  });
});

describe('parseErrorReport', () => {
  it('should read a report back into error messages', () => {
    const errors = parseErrorReport({
      valid: false,
      errors: [
        { message: 'sku is required', actualValue: null },
        { message: 'sku must be uppercase', actualValue: 'ab-1' }
      ]
    });

    expect(errors).toHaveLength(2);
    expect(errors[0].hasActualValue()).toBe(false);
    expect(errors[1].toString()).toBe('{"message":"sku must be uppercase","actualValue":"ab-1"}');
  });

  it('should reject a report with the wrong shape', () => {
    expect(() => parseErrorReport({ valid: false, errors: [{ text: 'x' }] })).toThrow(ReportFormatError);
    expect(() => parseErrorReport('nope')).toThrow(ReportFormatError);
  });

  it('should reject a valid report that carries errors', () => {
    expect(() => parseErrorReport({
      valid: true,
      errors: [{ message: 'x', actualValue: null }]
    })).toThrow(ReportFormatError);
  });
});

describe('formatErrors', () => {
  it('should render one line per error', () => {
    const result = resultFor<string>('sku')
      .ensure(failed, 'sku is required')
      .combine(resultFor<string>('price').ensure(failed, 'price is required', 0));

    expect(formatErrors(result)).toBe(
      '{"message":"sku is required","actualValue":null}\n' +
      '{"message":"price is required","actualValue":"0"}'
    );
  });

  it('should render nothing without errors', () => {
    expect(formatErrors(Result.as(1))).toBe('');
  });
});
