import { describe, it, expect } from 'vitest';
import {
  formatLabelSelector,
  parseLabelSelector,
} from '@functions/scheduler/discovery/labelSelector';
import { ConfigValidationError } from '@functions/scheduler/core/errors';

describe('parseLabelSelector', () => {
  it('should parse a single pair', () => {
    expect(parseLabelSelector('auto-schedule:true')).toEqual([{ key: 'auto-schedule', value: 'true' }]);
  });

  it('should trim keys and values of every entry', () => {
    expect(parseLabelSelector(' env : dev , tier:web ')).toEqual([
      { key: 'env', value: 'dev' },
      { key: 'tier', value: 'web' },
    ]);
  });

  it('should split on the first colon only', () => {
    expect(parseLabelSelector('owner:team:infra')).toEqual([{ key: 'owner', value: 'team:infra' }]);
  });

  it('should ignore entries without a colon', () => {
    expect(parseLabelSelector('orphan,env:dev')).toEqual([{ key: 'env', value: 'dev' }]);
  });

  it('should allow an empty value', () => {
    expect(parseLabelSelector('env:')).toEqual([{ key: 'env', value: '' }]);
  });

  it('should return an empty selector for an empty string', () => {
    expect(parseLabelSelector('')).toEqual([]);
  });

  it('should reject an entry with an empty key', () => {
    expect(() => parseLabelSelector('env:dev, :orphan')).toThrow(ConfigValidationError);
    expect(() => parseLabelSelector('env:dev, :orphan')).toThrow(
      "Invalid label selector entry ':orphan': empty key"
    );
  });
});

describe('formatLabelSelector', () => {
  it('should render pairs as a comma-separated list', () => {
    expect(
      formatLabelSelector([
        { key: 'auto-schedule', value: 'true' },
        { key: 'env', value: 'dev' },
      ])
    ).toBe('auto-schedule:true,env:dev');
  });
});
