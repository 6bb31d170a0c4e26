import { describe, it, expect } from 'vitest';

import { Kind, KIND_FAILURE_BOUNDARY } from '../types';
import { FAILURE_KINDS, is_failure_kind, is_success_kind, parse_kind_name, SUCCESS_KINDS } from './kind';

describe('Kind', () => {
  it('keeps the declared ordinals', () => {
    expect(Kind.Ok).toBe(0);
    expect(Kind.Accepted).toBe(3);
    expect(KIND_FAILURE_BOUNDARY).toBe(4);
    expect(Kind.FailedDependency).toBe(13);
  });

  it('partitions every kind into exactly one range', () => {
    expect(SUCCESS_KINDS.every(is_success_kind)).toBe(true);
    expect(FAILURE_KINDS.every(is_failure_kind)).toBe(true);
    expect(SUCCESS_KINDS.some(is_failure_kind)).toBe(false);
    expect(FAILURE_KINDS.some(is_success_kind)).toBe(false);
    expect(SUCCESS_KINDS.length + FAILURE_KINDS.length).toBe(14);
  });

  it('parses kind names', () => {
    expect(parse_kind_name('NotFound')).toBe(Kind.NotFound);
    expect(parse_kind_name('Ok')).toBe(Kind.Ok);
    expect(parse_kind_name('Missing')).toBeUndefined();
  });
});
