import { DirectoryConfig } from '../../types';
import { Logger } from '../../utils/logger';
import { GenericAdapter } from './generic_adapter';
import { PsychologyTodayAdapter } from './psychology_today';
import { SelectorAdapter } from './selector_adapter';
import { TherapyDenAdapter, ZencareAdapter } from './therapist_card_adapter';
import { SiteAdapter } from './types';

/**
 * Adapter lookup by `adapter_key`. Adding a site means registering one adapter;
 * anything unresolvable falls back to the generic adapter.
 */
export class AdapterRegistry {
    private adapters = new Map<string, SiteAdapter>();
    private readonly fallback: SiteAdapter;

    constructor(fallback: SiteAdapter = new GenericAdapter()) {
        this.fallback = fallback;
        this.register(fallback);
    }

    register(adapter: SiteAdapter): this {
        this.adapters.set(adapter.key, adapter);
        return this;
    }

    has(key: string): boolean {
        return this.adapters.has(key);
    }

    keys(): string[] {
        return [...this.adapters.keys()];
    }

    resolve(directory: DirectoryConfig): SiteAdapter {
        const adapter = this.adapters.get(directory.adapter_key);
        if (!adapter) {
            Logger.debug(`[AdapterRegistry] no adapter "${directory.adapter_key}", using ${this.fallback.key}`, {
                directory_id: directory.directory_id,
            });
            return this.fallback;
        }
        if (adapter.key === 'selector' && !directory.selectors) {
            Logger.warn('[AdapterRegistry] selector adapter without selectors, using fallback', {
                directory_id: directory.directory_id,
            });
            return this.fallback;
        }
        return adapter;
    }
}

export function createDefaultRegistry(): AdapterRegistry {
    return new AdapterRegistry()
        .register(new PsychologyTodayAdapter())
        .register(new ZencareAdapter())
        .register(new TherapyDenAdapter())
        .register(new SelectorAdapter());
}
