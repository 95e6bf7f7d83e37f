import { describe, it, expect } from 'vitest';
import { formatCreatorName, splitName } from '../../src/core/name-parser.js';

describe('splitName', () => {
  it('splits "Family, Given" on the first comma', () => {
    expect(splitName('Doe, John')).toEqual({ family: 'Doe', given: 'John' });
  });

  it('splits "Family; Given" on the first semicolon', () => {
    expect(splitName('Doe; Jane')).toEqual({ family: 'Doe', given: 'Jane' });
  });

  it('splits "Given Family" on the first space', () => {
    expect(splitName('Jane Smith')).toEqual({ given: 'Jane', family: 'Smith' });
  });

  it('keeps the rest of the name as the family name', () => {
    expect(splitName('Jane van der Berg')).toEqual({ given: 'Jane', family: 'van der Berg' });
  });

  it('prefers a comma over a semicolon', () => {
    expect(splitName('Doe, John; Jr')).toEqual({ family: 'Doe', given: 'John; Jr' });
  });

  it('treats a single word as the given name', () => {
    expect(splitName('Madonna')).toEqual({ given: 'Madonna', family: '' });
  });

  it('trims the input and both parts', () => {
    expect(splitName('  Doe , John  ')).toEqual({ family: 'Doe', given: 'John' });
  });
});

describe('formatCreatorName', () => {
  it('renders "Family, Given"', () => {
    expect(formatCreatorName(splitName('John Doe'))).toBe('Doe, John');
  });

  it('drops the separator when the family name is empty', () => {
    expect(formatCreatorName(splitName('Madonna'))).toBe('Madonna');
  });

  it('drops the separator when the given name is empty', () => {
    expect(formatCreatorName(splitName('Smith,'))).toBe('Smith');
  });
});
