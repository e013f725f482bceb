import type { HostEventName, HostEvents, HostHandler } from './events.js';

type HandlerMap = { [K in HostEventName]: Array<HostHandler<K>> };

export interface Plugin {
  subscribe(dispatcher: Dispatcher): void;
}

// Handlers run one at a time in registration order; a rejection stops the fire.
export class Dispatcher {
  private readonly handlers: HandlerMap = {
    'config-loaded': [],
    'arg-parse': [],
    'arg-parsed': [],
    startup: [],
    cleanup: [],
  };

  register(plugin: Plugin): this {
    plugin.subscribe(this);
    return this;
  }

  listen<K extends HostEventName>(name: K, handler: HostHandler<K>): this {
    this.handlers[name].push(handler);
    return this;
  }

  async fire<K extends HostEventName>(name: K, event: HostEvents[K]): Promise<void> {
    for (const handler of this.handlers[name]) {
      await handler(event);
    }
  }
}
