import type { ProviderId } from "../config/types.js";
import type { ChannelAdapter } from "./adapter.js";

/** The WhatsApp providers available for outbound replies, one adapter per provider id. */
export class ChannelRegistry {
  private readonly adapters = new Map<ProviderId, ChannelAdapter>();

  constructor(adapters: Iterable<ChannelAdapter> = []) {
    for (const adapter of adapters) this.register(adapter);
  }

  register(adapter: ChannelAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Provider already registered: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
  }

  get(id: ProviderId): ChannelAdapter | undefined {
    return this.adapters.get(id);
  }

  has(id: ProviderId): boolean {
    return this.adapters.has(id);
  }

  /** Registered provider ids in registration order. */
  ids(): ProviderId[] {
    return [...this.adapters.keys()];
  }

  list(): ChannelAdapter[] {
    return [...this.adapters.values()];
  }

  get size(): number {
    return this.adapters.size;
  }
}
