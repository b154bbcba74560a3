/**
 * DomainEventBus Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { DomainEventBus } from '../DomainEventBus';
import { account, testLogger } from './helpers/fixtures';

describe('DomainEventBus', () => {
  let bus: DomainEventBus;

  beforeEach(() => {
    bus = new DomainEventBus(testLogger());
  });

  it('should run handlers in subscription order before publish returns', () => {
    const calls: string[] = [];
    bus.subscribe('UserDenied', 'first', (payload) => calls.push(`first:${payload.userType}`));
    bus.subscribe('UserDenied', 'second', (_payload, block) => calls.push(`second:${block}`));

    bus.publish('UserDenied', { account: account(1), userType: 'inspector' }, 42);

    expect(calls).toEqual(['first:inspector', 'second:42']);
  });

  it('should only dispatch to handlers of the published type', () => {
    const calls: string[] = [];
    bus.subscribe('UserRegistered', 'registered', () => calls.push('registered'));

    bus.publish('UserDenied', { account: account(1), userType: 'inspector' }, 1);

    expect(calls).toEqual([]);
  });

  it('should log every event with a sequence number', () => {
    bus.publish('UserRegistered', { account: account(1), userType: 'regenerator', inviter: null }, 3);
    bus.publish('UserDenied', { account: account(1), userType: 'regenerator' }, 5);

    expect(bus.getEvents().map((event) => [event.sequence, event.type, event.block])).toEqual([
      [1, 'UserRegistered', 3],
      [2, 'UserDenied', 5],
    ]);
    expect(bus.getEvents('UserDenied')).toHaveLength(1);
  });

  it('should propagate a handler failure and skip the remaining handlers', () => {
    const calls: string[] = [];
    bus.subscribe('UserDenied', 'failing', () => {
      throw new Error('handler failed');
    });
    bus.subscribe('UserDenied', 'after', () => calls.push('after'));

    expect(() => bus.publish('UserDenied', { account: account(1), userType: 'inspector' }, 1)).toThrow('handler failed');
    expect(calls).toEqual([]);
  });
});
