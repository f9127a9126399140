import { GovernanceEventBus, attachLogSink } from '../governor/utils/events.js';
import { getLogger } from '../governor/utils/logger.js';

describe('GovernanceEventBus', () => {
  it('delivers payloads to listeners in registration order', () => {
    const bus = new GovernanceEventBus();
    const seen: string[] = [];
    bus.on('cache.hit', (event) => seen.push(`first:${event.key}`));
    bus.on('cache.hit', (event) => seen.push(`second:${event.key}`));

    bus.emit('cache.hit', { key: 'q1' });

    expect(seen).toEqual(['first:q1', 'second:q1']);
  });

  it('unsubscribes through the returned function and off', () => {
    const bus = new GovernanceEventBus();
    const a = jest.fn();
    const b = jest.fn();
    const unsubscribe = bus.on('cache.miss', a);
    bus.on('cache.miss', b);

    unsubscribe();
    bus.off('cache.miss', b);
    bus.emit('cache.miss', { key: 'q1', tenantId: 't1' });

    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
    expect(bus.listenerCount('cache.miss')).toBe(0);
  });

  it('isolates a failing listener', () => {
    const bus = new GovernanceEventBus();
    const after = jest.fn();
    bus.on('quota.denied', () => {
      throw new Error('sink offline');
    });
    bus.on('quota.denied', after);

    const payload = { tenantId: 't1', resource: 'jobs' as const, requested: 1, current: 5, limit: 5 };
    expect(() => bus.emit('quota.denied', payload)).not.toThrow();
    expect(after).toHaveBeenCalledWith(payload);
  });

  it('attaches a log sink for every event', () => {
    const bus = new GovernanceEventBus();
    attachLogSink(bus, getLogger());

    expect(bus.listenerCount('cache.hit')).toBe(1);
    expect(bus.listenerCount('cache.miss')).toBe(1);
    expect(bus.listenerCount('cache.eviction')).toBe(1);
    expect(bus.listenerCount('quota.denied')).toBe(1);
    expect(bus.listenerCount('prune.completed')).toBe(1);
  });
});
