import { describe, it, expect } from 'vitest';
import { EventBus, getEventBus } from '../../../src/core/events.js';
import { createLogger, getLogger, setLogger } from '../../../src/core/logger.js';

describe('EventBus', () => {
  it('should deliver typed payloads to listeners', () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('object:destroyed', (e) => seen.push(`${e.unitId}/${e.instanceId}`));

    bus.emit('object:destroyed', { unitId: 'Pool', instanceId: 'abc' });

    expect(seen).toEqual(['Pool/abc']);
  });

  it('should deliver once-listeners a single time', () => {
    const bus = new EventBus();
    let calls = 0;
    bus.once('object:destroyed', () => calls++);

    bus.emit('object:destroyed', { unitId: 'Pool', instanceId: 'a' });
    bus.emit('object:destroyed', { unitId: 'Pool', instanceId: 'b' });

    expect(calls).toBe(1);
    expect(bus.listenerCount('object:destroyed')).toBe(0);
  });

  it('should stop delivering after off', () => {
    const bus = new EventBus();
    let calls = 0;
    const listener = () => {
      calls++;
    };
    bus.on('object:destroyed', listener);
    bus.off('object:destroyed', listener);

    bus.emit('object:destroyed', { unitId: 'Pool', instanceId: 'a' });
    expect(calls).toBe(0);
  });

  it('should share one process-wide bus', () => {
    expect(getEventBus()).toBe(getEventBus());
  });
});

describe('logger', () => {
  it('should create loggers at the requested level', () => {
    expect(createLogger('covenant', { level: 'debug' }).level).toBe('debug');
    expect(createLogger().level).toBe('warn');
  });

  it('should swap the shared logger', () => {
    const previous = getLogger();
    const replacement = createLogger('replacement', { level: 'silent' });

    setLogger(replacement);
    expect(getLogger()).toBe(replacement);
    setLogger(previous);
  });
});
