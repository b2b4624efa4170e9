import {
  categorize,
  involvesRegion,
  isDomestic,
  isIncoming,
  isInScopeController,
  isOutgoing,
  RegionScope,
} from './region-classifier';

describe('region classifier', () => {
  const scope = new RegionScope(['AB']);

  it('should categorize a flight leaving the region as outgoing only', () => {
    const flight = { departure: 'AB12', arrival: 'CD34' };

    expect(categorize(scope, flight)).toBe('outgoing');
    expect(isOutgoing(scope, flight)).toBe(true);
    expect(isDomestic(scope, flight)).toBe(false);
    expect(isIncoming(scope, flight)).toBe(false);
  });

  it('should categorize domestic and incoming flights', () => {
    expect(categorize(scope, { departure: 'AB12', arrival: 'AB99' })).toBe('domestic');
    expect(categorize(scope, { departure: 'CD34', arrival: 'AB12' })).toBe('incoming');
  });

  it('should leave flights outside the region unrelated', () => {
    const flight = { departure: 'CD34', arrival: 'EF56' };

    expect(categorize(scope, flight)).toBe('unrelated');
    expect(involvesRegion(scope, flight)).toBe(false);
  });

  it('should match controllers by callsign prefix', () => {
    expect(isInScopeController(scope, { callsign: 'AB12_TWR' })).toBe(true);
    expect(isInScopeController(scope, { callsign: 'XAB_CTR' })).toBe(false);
  });

  it('should match nothing with an empty prefix set', () => {
    const empty = new RegionScope([]);

    expect(involvesRegion(empty, { departure: 'AB12', arrival: 'AB34' })).toBe(false);
    expect(empty.matches('')).toBe(false);
  });

  it('should normalize prefixes', () => {
    const normalized = new RegionScope([' sc', 'SC', 'sa', '']);

    expect(normalized.prefixes).toEqual(['SC', 'SA']);
    expect(Object.isFrozen(normalized.prefixes)).toBe(true);
    expect(normalized.matches('scel')).toBe(true);
  });
});
