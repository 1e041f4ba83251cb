import { describe, it, expect } from 'vitest';

import { LimitOffsetStrategy, OffsetFetchStrategy, RownumWrapStrategy } from '../limit-strategy';

describe('LimitOffsetStrategy', () => {
  it('should render nothing without positive values', () => {
    expect(new LimitOffsetStrategy().fragment({ limit: null, offset: null })).toBe('');
    expect(new LimitOffsetStrategy().fragment({ limit: 0, offset: 0 })).toBe('');
  });

  it('should render a limit alone', () => {
    expect(new LimitOffsetStrategy('-1').fragment({ limit: 25, offset: null })).toBe('LIMIT 25');
  });

  it('should leave the statement unchanged on finalize', () => {
    expect(new LimitOffsetStrategy().finalize('SELECT 1')).toBe('SELECT 1');
  });
});

describe('OffsetFetchStrategy', () => {
  it('should render an offset alone', () => {
    expect(new OffsetFetchStrategy().fragment({ limit: null, offset: 15 })).toBe('OFFSET 15 ROWS');
  });
});

describe('RownumWrapStrategy', () => {
  const strategy = new RownumWrapStrategy();

  it('should wrap with an offset alone', () => {
    expect(strategy.finalize('SELECT 1', { limit: null, offset: 5 })).toBe(
      'select * from (select rownum rnum, a.* from (SELECT 1) a) where rnum > 5',
    );
  });

  it('should wrap with a limit alone', () => {
    expect(strategy.finalize('SELECT 1', { limit: 10, offset: null })).toBe(
      'select * from (select rownum rnum, a.* from (SELECT 1) a where rownum <= 10) where rnum > 0',
    );
  });

  it('should not wrap without bounds', () => {
    expect(strategy.mode).toBe('wrap');
    expect(strategy.fragment()).toBe('');
    expect(strategy.finalize('SELECT 1', { limit: null, offset: null })).toBe('SELECT 1');
  });
});
