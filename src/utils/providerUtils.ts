import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    // Unset env values arrive as undefined and must not erase the provider defaults.
    const defined = Object.fromEntries(
        Object.entries(override).filter(([, value]) => value !== undefined)
    );

    return {
        ...defaults,
        ...defined,
    };
}
