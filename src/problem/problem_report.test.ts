import { describe, it, expect } from 'vitest';

import { Kind } from '../types';
import { create_failure, fail, fail_errors, fail_validation, succeed_message } from '../result/result';
import { validation_error } from '../result/validation_error';
import { ContractViolationError } from '../utils/errors.util';
import { as_problem_report, problem_to_json, STATUS_DOCUMENTATION_BASE } from './problem_report';
import { kind_to_status } from './status';

describe('kind_to_status', () => {
  it('maps every kind', () => {
    expect(kind_to_status(Kind.Ok)).toBe(200);
    expect(kind_to_status(Kind.Accepted)).toBe(202);
    expect(kind_to_status(Kind.Critical)).toBe(500);
    expect(kind_to_status(Kind.Invalid)).toBe(400);
    expect(kind_to_status(Kind.Unprocessable)).toBe(422);
    expect(kind_to_status(Kind.Unauthorized)).toBe(401);
    expect(kind_to_status(Kind.NotFound)).toBe(404);
    expect(kind_to_status(Kind.FailedDependency)).toBe(424);
  });
});

describe('as_problem_report', () => {
  it('rejects a success', () => {
    expect(() => as_problem_report(succeed_message())).toThrow(ContractViolationError);
  });

  it('attaches validation errors under the errors extension', () => {
    const report = as_problem_report(
      fail_validation([validation_error('Some error', '/name'), validation_error('No pointer')], 'Bad input'),
    );
    expect(report).toEqual({
      type: `${STATUS_DOCUMENTATION_BASE}/400`,
      title: 'Bad input',
      status: 400,
      detail: 'Some error',
      extensions: { errors: [{ pointer: '/name', detail: 'Some error' }, { detail: 'No pointer' }] },
    });
  });

  it('prefers the failure detail over the first error', () => {
    const report = as_problem_report(create_failure({ title: 'Nope', detail: 'specific', errors: ['generic'] }));
    expect(report.detail).toBe('specific');
    expect(report.extensions).toEqual({});
  });

  it('applies overrides', () => {
    const report = as_problem_report(fail('Missing', 'no such order', Kind.NotFound), {
      detail: 'order 12 not found',
      instance: '/orders/12',
      status: 410,
      title: 'Gone',
      type: 'https://example.test/problems/gone',
      extensions: { retry: false },
    });
    expect(report).toEqual({
      type: 'https://example.test/problems/gone',
      title: 'Gone',
      status: 410,
      detail: 'order 12 not found',
      instance: '/orders/12',
      extensions: { retry: false },
    });
  });

  it('derives the default type from the kind, not the status override', () => {
    const report = as_problem_report(fail_errors(['x']), { status: 418 });
    expect(report.type).toBe(`${STATUS_DOCUMENTATION_BASE}/500`);
    expect(report.status).toBe(418);
  });

  it('leaves detail out when nothing provides one', () => {
    expect('detail' in as_problem_report(create_failure({ title: 'Empty' }))).toBe(false);
  });

  it('refuses to overwrite a caller errors extension', () => {
    expect(() =>
      as_problem_report(fail_validation([validation_error('x')]), { extensions: { errors: [] } }),
    ).toThrow("extension key 'errors' is reserved for validation errors.");
  });
});

describe('problem_to_json', () => {
  it('lifts extensions to the top level', () => {
    const json = problem_to_json(as_problem_report(fail('Busy', 'try later', Kind.Unavailable), { extensions: { retryAfter: 30 } }));
    expect(json).toEqual({
      retryAfter: 30,
      type: `${STATUS_DOCUMENTATION_BASE}/503`,
      title: 'Busy',
      status: 503,
      detail: 'try later',
    });
  });
});
