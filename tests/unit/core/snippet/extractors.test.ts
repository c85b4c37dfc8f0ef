/**
 * Tests for the request and path parameter extractors.
 */
import { describe, it, expect } from 'vitest';
import {
  PathParameterExtractor,
  RequestParameterExtractor,
  getUrlTemplate,
  parsePathVariables,
} from '../../../../src/core/snippet/extractors.js';
import { MissingUrlTemplateError } from '../../../../src/utils/errors.js';
import { makeOperation } from '../../../fixtures/operations.js';

describe('RequestParameterExtractor', () => {
  it('returns the names of the request parameters', () => {
    const operation = makeOperation({ parameters: { page: ['1'], tag: ['a', 'b'] } });

    expect(new RequestParameterExtractor().extractActualParameters(operation)).toEqual(new Set(['page', 'tag']));
  });

  it('returns an empty set for a request without parameters', () => {
    expect(new RequestParameterExtractor().extractActualParameters(makeOperation()).size).toBe(0);
  });
});

describe('parsePathVariables', () => {
  it('extracts each variable once', () => {
    expect(parsePathVariables('/users/{userId}/posts/{postId}')).toEqual(new Set(['userId', 'postId']));
    expect(parsePathVariables('/a/{id}/b/{id}')).toEqual(new Set(['id']));
  });

  it('does not match across path segments', () => {
    expect(parsePathVariables('/{a/b}/{c}')).toEqual(new Set(['c']));
  });

  it('finds nothing in a literal path', () => {
    expect(parsePathVariables('/health').size).toBe(0);
  });
});

describe('PathParameterExtractor', () => {
  it('reads variables from the url template attribute', () => {
    const operation = makeOperation({ urlTemplate: '/users/{id}' });

    expect(new PathParameterExtractor().extractActualParameters(operation)).toEqual(new Set(['id']));
  });

  it('fails when the operation has no url template', () => {
    expect(() => new PathParameterExtractor().extractActualParameters(makeOperation({ name: 'get-user' }))).toThrow(
      MissingUrlTemplateError
    );
    expect(() => getUrlTemplate(makeOperation({ name: 'get-user' }))).toThrow(
      "urlTemplate not found for operation 'get-user'"
    );
  });
});
