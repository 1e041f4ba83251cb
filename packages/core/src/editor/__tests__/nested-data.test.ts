import { describe, it, expect } from 'vitest';

import { DuplicatePropertyError, PropertyConflictError } from '../../errors';
import { propExists, readProp, writeProp } from '../nested-data';

import type { NestedData } from '../nested-data';

describe('nested data', () => {
  describe('readProp', () => {
    it('should read dotted paths and array indexes', () => {
      const data = { name: { first: 'Ada' }, phones: ['111', '222'] };

      expect(readProp(data, 'name.first')).toBe('Ada');
      expect(readProp(data, 'phones.1')).toBe('222');
      expect(readProp(data, 'name.last')).toBeUndefined();
      expect(readProp(data, 'name.first.initial')).toBeUndefined();
    });

    it('should read flat keys without splitting', () => {
      expect(readProp({ site: 2 }, 'site')).toBe(2);
    });
  });

  describe('propExists', () => {
    it('should count null leaves as present', () => {
      const data = { name: { first: null }, list: [1] };

      expect(propExists(data, 'name.first')).toBe(true);
      expect(propExists(data, 'name.last')).toBe(false);
      expect(propExists(data, 'list.0')).toBe(true);
      expect(propExists(data, 'list.1')).toBe(false);
    });
  });

  describe('writeProp', () => {
    it('should create intermediate objects', () => {
      const out: NestedData = {};
      writeProp(out, 'name.first', 'Ada');
      writeProp(out, 'name.last', 'Lovelace');
      writeProp(out, 'site', 2);

      expect(out).toEqual({ name: { first: 'Ada', last: 'Lovelace' }, site: 2 });
    });

    it('should refuse to write through a value', () => {
      expect(() => writeProp({ name: 'Ada' }, 'name.first', 'Ada')).toThrow(PropertyConflictError);
    });

    it('should refuse to overwrite a nested leaf', () => {
      expect(() => writeProp({ name: { first: 'Ada' } }, 'name.first', 'Grace')).toThrow(
        'Duplicate field detected - a field with the name `name.first` already exists.',
      );
      expect(() => writeProp({ name: { first: 'Ada' } }, 'name.first', 'Grace')).toThrow(DuplicatePropertyError);
    });
  });
});
