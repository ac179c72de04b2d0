// Tiny typed bus so session parts talk without globals.
// One bus per session; nothing module-level.
import { warnLog } from '../env/logging';

export type BusHandler<T> = (detail: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: Set<BusHandler<Events[K]>> };

export class Bus<Events extends Record<string, unknown>> {
  private readonly handlers: HandlerTable<Events> = {};

  on<K extends keyof Events>(type: K, fn: BusHandler<Events[K]>): () => void {
    const handlers: Set<BusHandler<Events[K]>> = this.handlers[type] ?? new Set<BusHandler<Events[K]>>();
    this.handlers[type] = handlers;
    handlers.add(fn);
    return () => {
      handlers.delete(fn);
    };
  }

  emit<K extends keyof Events>(type: K, detail: Events[K]): void {
    const set = this.handlers[type];
    if (!set) return;
    for (const fn of [...set]) {
      try {
        fn(detail);
      } catch (err) {
        warnLog('bus', 'handler error', String(type), err);
      }
    }
  }
}
