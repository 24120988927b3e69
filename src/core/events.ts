import { EventEmitter } from 'eventemitter3';
import type { CovenantEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof CovenantEvents>(event: K, listener: (data: CovenantEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof CovenantEvents>(event: K, listener: (data: CovenantEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof CovenantEvents>(event: K, listener: (data: CovenantEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof CovenantEvents>(event: K, data: CovenantEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof CovenantEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

let _bus: EventBus | null = null;

/** Process-wide bus that violation and lifecycle events are published on. */
export function getEventBus(): EventBus {
  if (!_bus) {
    _bus = new EventBus();
  }
  return _bus;
}
