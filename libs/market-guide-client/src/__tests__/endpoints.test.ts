import { describe, expect, it } from 'vitest';
import { ENDPOINTS, fillTemplate, placeholdersOf, resolveEndpoint } from '../endpoints';
import { EndpointTemplateError } from '../errors';

describe('endpoint catalog', () => {
  it('resolves templates with their placeholders', () => {
    expect(resolveEndpoint('stockInfo', { id: '5247' })).toEqual({
      name: 'stockInfo',
      method: 'GET',
      path: '/_api/market-guide/stock/5247',
    });
    expect(resolveEndpoint('fundChart', { id: 41567, timePeriod: 'three_years' }).path).toBe(
      '/_api/fund-guide/chart/41567/three_years'
    );
  });

  it('resolves templates without placeholders', () => {
    expect(resolveEndpoint('search')).toEqual({
      name: 'search',
      method: 'POST',
      path: '/_api/search/filtered-search',
    });
  });

  it('encodes substituted values', () => {
    expect(fillTemplate('/x/{id}', { id: 'a/b c' })).toBe('/x/a%2Fb%20c');
  });

  it('rejects missing placeholders', () => {
    expect(() => fillTemplate('/_api/fund-guide/chart/{id}/{timePeriod}', { id: '1' })).toThrow(
      new EndpointTemplateError('/_api/fund-guide/chart/{id}/{timePeriod}', ['timePeriod'], [])
    );
  });

  it('treats empty values as missing', () => {
    expect(() => fillTemplate('/x/{id}', { id: '' })).toThrow('Cannot fill endpoint template /x/{id}: missing {id}');
  });

  it('rejects unexpected parameters', () => {
    let caught: unknown;
    try {
      fillTemplate('/x/{id}', { id: '1', period: 'today' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EndpointTemplateError);
    expect(caught).toMatchObject({
      missing: [],
      unexpected: ['period'],
      message: 'Cannot fill endpoint template /x/{id}: unexpected period',
    });
  });

  it('only uses id and timePeriod placeholders across the catalog', () => {
    const names = new Set(Object.values(ENDPOINTS).flatMap((endpoint) => placeholdersOf(endpoint.template)));
    expect([...names].sort()).toEqual(['id', 'timePeriod']);
  });
});
