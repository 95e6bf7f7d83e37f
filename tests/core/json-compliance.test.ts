import { describe, it, expect } from 'vitest';
import { findJsonViolation } from '../../src/core/json-compliance.js';

describe('findJsonViolation', () => {
  it('accepts strict JSON', () => {
    expect(findJsonViolation({ a: 1, b: [true, null, 'x'], c: { d: -2.5 } })).toBeNull();
  });

  it('rejects NaN with its path', () => {
    expect(findJsonViolation({ foo: NaN })).toBe(
      'Out of range float values are not JSON compliant: NaN at $.foo'
    );
  });

  it('rejects Infinity inside arrays', () => {
    expect(findJsonViolation([1, Infinity])).toBe(
      'Out of range float values are not JSON compliant: Infinity at $[1]'
    );
  });

  it('rejects functions and undefined', () => {
    expect(findJsonViolation({ f: () => 1 })).toBe(
      'Object of type function is not JSON serializable at $.f'
    );
    expect(findJsonViolation({ u: undefined })).toBe(
      'Object of type undefined is not JSON serializable at $.u'
    );
  });

  it('rejects bigint', () => {
    expect(findJsonViolation(10n)).toBe('Object of type bigint is not JSON serializable at $');
  });

  it('rejects class instances by constructor name', () => {
    expect(findJsonViolation({ when: new Date(0) })).toBe(
      'Object of type Date is not JSON serializable at $.when'
    );
  });

  it('rejects objects whose prototype has no constructor', () => {
    expect(findJsonViolation({ a: Object.create(Object.create(null)) })).toBe(
      'Object of type object is not JSON serializable at $.a'
    );
  });

  it('rejects circular references', () => {
    const node: Record<string, unknown> = { name: 'root' };
    node['self'] = node;
    expect(findJsonViolation(node)).toBe('Circular reference detected at $.self');
  });

  it('allows the same object to appear twice without a cycle', () => {
    const shared = { x: 1 };
    expect(findJsonViolation({ a: shared, b: [shared] })).toBeNull();
  });
});
