/**
 * Rule Matcher Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import {
  RuleMatcher,
  createRule,
  matchesPattern,
  normalizePath,
  normalizePattern,
} from '../src/rules/rule-matcher.js';

const settings = { limit: 10, windowSeconds: 60, strategy: 'fixed' };

describe('normalizePattern', () => {
  it('should_markWildcard_when_patternEndsWithSlashStar', () => {
    expect(normalizePattern('/api/*')).toEqual({ prefix: '/api', wildcard: true });
    expect(normalizePattern('/api//*')).toEqual({ prefix: '/api', wildcard: true });
  });

  it('should_stripTrailingSlash_when_exact', () => {
    expect(normalizePattern('/login/')).toEqual({ prefix: '/login', wildcard: false });
  });

  it('should_coverEveryPath_when_rootWildcard', () => {
    const root = normalizePattern('/*');
    expect(root).toEqual({ prefix: '', wildcard: true });
    expect(matchesPattern(root, normalizePath('/anything/here'))).toBe(true);
  });
});

describe('matchesPattern', () => {
  const api = normalizePattern('/api/*');
  const login = normalizePattern('/login');

  it('should_matchPrefixAndDescendants_when_wildcard', () => {
    expect(matchesPattern(api, normalizePath('/api'))).toBe(true);
    expect(matchesPattern(api, normalizePath('/api/'))).toBe(true);
    expect(matchesPattern(api, normalizePath('/api/users/7'))).toBe(true);
  });

  it('should_notMatchSiblingWithSharedPrefix_when_wildcard', () => {
    expect(matchesPattern(api, normalizePath('/apikeys'))).toBe(false);
  });

  it('should_matchOnlySamePath_when_exact', () => {
    expect(matchesPattern(login, normalizePath('/login/'))).toBe(true);
    expect(matchesPattern(login, normalizePath('/login/reset'))).toBe(false);
  });
});

describe('createRule', () => {
  it('should_buildFrozenRule_when_settingsValid', () => {
    const rule = createRule('/api/*', { ...settings, strategy: 'Moving' });

    expect(rule).toEqual({
      pattern: '/api/*',
      prefix: '/api',
      wildcard: true,
      limit: 10,
      windowSeconds: 60,
      strategy: 'moving',
    });
    expect(Object.isFrozen(rule)).toBe(true);
  });

  it('should_throwConfigurationError_when_strategyUnknown', () => {
    expect(() => createRule('/x', { ...settings, strategy: 'token-bucket' })).toThrow(ConfigurationError);
    expect(() => createRule('/x', { ...settings, strategy: 'token-bucket' })).toThrow(
      'Unknown strategy "token-bucket" for rule /x (expected one of: fixed, sliding, moving)'
    );
  });

  it('should_throwConfigurationError_when_numbersInvalid', () => {
    expect(() => createRule('/x', { ...settings, windowSeconds: 0 })).toThrow(ConfigurationError);
    expect(() => createRule('/x', { ...settings, limit: -1 })).toThrow(ConfigurationError);
    expect(() => createRule('/x', { ...settings, limit: 1.5 })).toThrow(ConfigurationError);
  });

  it('should_acceptZeroLimit_when_pathIsClosed', () => {
    expect(createRule('/x', { ...settings, limit: 0 }).limit).toBe(0);
  });
});

describe('RuleMatcher', () => {
  const matcher = new RuleMatcher(
    [
      createRule('/login', settings),
      createRule('/api/v1/*', settings),
      createRule('/api/*', settings),
      createRule('/api/v1/users', settings),
    ],
    ['/health', '/static/*']
  );

  it('should_orderWildcardsShortFirstThenExactLongFirst_when_built', () => {
    expect(matcher.getRules().map((r) => r.pattern)).toEqual(['/api/*', '/api/v1/*', '/api/v1/users', '/login']);
  });

  it('should_returnEveryMatchingRule_when_pathCoveredTwice', () => {
    expect(matcher.matchRules('/api/v1/users/').map((r) => r.pattern)).toEqual([
      '/api/*',
      '/api/v1/*',
      '/api/v1/users',
    ]);
  });

  it('should_returnEmpty_when_nothingMatches', () => {
    expect(matcher.matchRules('/about')).toEqual([]);
  });

  it('should_detectExemptions_when_pathNormalized', () => {
    expect(matcher.isExempt('/health/')).toBe(true);
    expect(matcher.isExempt('/static/app.js')).toBe(true);
    expect(matcher.isExempt('/healthz')).toBe(false);
  });
});
