/**
 * SHELL: Delay Board
 * Huxley (National Rail REST wrapper) client plus a per-route cache the delay machine reads.
 * Network failures never reach a machine tick: the board falls back to an empty list.
 */

import type { DelayRecord, DelaySource } from '../core/delays';
import type { MonitorLogger } from '../core/logger';
import { DelaysBoardResponseSchema } from '../core/schema';

export type FetchFn = (url: string) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export interface HuxleyOptions {
    baseUrl: string;
    accessToken: string;
    fetchFn?: FetchFn;
}

export class HuxleyClient {
    private fetchFn: FetchFn;

    constructor(private options: HuxleyOptions) {
        this.fetchFn = options.fetchFn ?? ((url) => fetch(url));
    }

    buildUrl(fromStation: string, toStation: string): string {
        const base = this.options.baseUrl.replace(/\/+$/, '');
        const token = encodeURIComponent(this.options.accessToken);
        return `${base}/delays/${encodeURIComponent(fromStation)}/to/${encodeURIComponent(toStation)}?accessToken=${token}`;
    }

    /**
     * Services from `fromStation` to `toStation` that are not running on time.
     */
    async getDelays(fromStation: string, toStation: string): Promise<DelayRecord[]> {
        const response = await this.fetchFn(this.buildUrl(fromStation, toStation));
        if (!response.ok) {
            throw new Error(`Delay board request failed: HTTP ${response.status}`);
        }

        const parsed = DelaysBoardResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error(`Delay board response invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }
        return (parsed.data.trainServices ?? []).filter((s) => s.etd !== 'On time');
    }
}

export interface DelayLookup {
    getDelays(fromStation: string, toStation: string): Promise<DelayRecord[]>;
}

export class DelayBoard implements DelaySource {
    private cache = new Map<string, DelayRecord[]>();
    private failures = 0;

    constructor(
        private lookup: DelayLookup,
        private logger: MonitorLogger
    ) {}

    getDelays(fromStation: string, toStation: string): DelayRecord[] {
        return this.cache.get(routeKey(fromStation, toStation)) ?? [];
    }

    async refresh(fromStation: string, toStation: string): Promise<DelayRecord[]> {
        const key = routeKey(fromStation, toStation);
        try {
            const delays = await this.lookup.getDelays(fromStation, toStation);
            this.cache.set(key, delays);
            this.logger.debug(`[DelayBoard] ${key}: ${delays.length} delayed services`);
            return delays;
        } catch (err) {
            this.failures++;
            this.cache.set(key, []);
            this.logger.warn(`[DelayBoard] ${key} lookup failed, assuming no delays: ${err instanceof Error ? err.message : String(err)}`);
            return [];
        }
    }

    getFailureCount(): number {
        return this.failures;
    }
}

function routeKey(fromStation: string, toStation: string): string {
    return `${fromStation.toUpperCase()}->${toStation.toUpperCase()}`;
}
