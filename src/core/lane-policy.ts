import type { Lane, LaneDecision } from '../types/orchestration.js';

const CLOUD_HINTS = new Set(['cloud', 'cloud_direct']);

export interface LanePolicyOptions {
    enableCloudLane: boolean;
    onDeviceProvider: string;
    cloudProvider: string;
}

/**
 * Picks the lane for a question. The grounded on-device lane is the default; a
 * `cloud` hint moves to the cloud lane only while that lane is enabled.
 */
export class LanePolicy {
    readonly #options: LanePolicyOptions;

    constructor(options: LanePolicyOptions) {
        this.#options = { ...options };
    }

    get cloudLaneEnabled(): boolean {
        return this.#options.enableCloudLane;
    }

    providerFor(lane: Lane): string {
        return lane === 'cloud_direct' ? this.#options.cloudProvider : this.#options.onDeviceProvider;
    }

    decide(_question: string, sourceHint?: string | null): LaneDecision {
        const hint = sourceHint?.trim().toLowerCase();
        if (hint && CLOUD_HINTS.has(hint)) {
            if (this.#options.enableCloudLane) {
                return { lane: 'cloud_direct', provider: this.#options.cloudProvider, reason: 'cloud hint' };
            }
            return {
                lane: 'on_device_rag',
                provider: this.#options.onDeviceProvider,
                reason: 'cloud hint ignored: cloud lane disabled',
            };
        }
        return { lane: 'on_device_rag', provider: this.#options.onDeviceProvider, reason: 'default lane' };
    }
}
