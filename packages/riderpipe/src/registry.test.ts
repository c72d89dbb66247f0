import { fullName, RiderRegistry } from './registry';

describe('RiderRegistry', () => {
  it('returns the same rider for the same key', () => {
    const registry = new RiderRegistry();
    const first = registry.getOrCreate('jane@example.com', 'Jane');
    const second = registry.getOrCreate('jane@example.com');
    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('fills empty names but never replaces them', () => {
    const registry = new RiderRegistry();
    registry.getOrCreate('jane@example.com', '', 'Doe');
    const rider = registry.getOrCreate('jane@example.com', ' Jane ', 'Smith');
    expect(rider.firstName).toBe('Jane');
    expect(rider.lastName).toBe('Doe');
  });

  it('starts new riders at contact with nothing recorded', () => {
    const rider = new RiderRegistry().getOrCreate('andy_dibrino', 'Andy', 'DiBrino');
    expect(rider.stage).toBe('contact');
    expect(rider.milestones).toEqual({});
    expect(rider.saleValue).toBeNull();
    expect(fullName(rider)).toBe('Andy DiBrino');
  });

  it('finds riders by exact full name, ignoring case', () => {
    const registry = new RiderRegistry();
    const rider = registry.getOrCreate('andy@example.com', 'Andy', 'DiBrino');
    expect(registry.findByName('andy dibrino')).toBe(rider);
    expect(registry.findByName('Andy')).toBeUndefined();
    expect(registry.findByName('')).toBeUndefined();
  });
});
