import { logger as rootLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { Result } from "./result.js";
import type { ProviderFault } from "../types/supervised-call.types.js";
import { sleep as defaultSleep } from "./utils.js";
import type { Sleep } from "./utils.js";
import { describeFault } from "./errors.js";



/**
 * Configuration for retrying rate-limited provider calls.
 * @property maxRetries - Retries after the first call; 0 disables retrying.
 * @property initialDelayMs - Wait before the first retry.
 * @property backoffFactor - Growth of the wait between retries.
 */
export type TransientRetryConfig = {
    maxRetries: number;
    initialDelayMs?: number;
    backoffFactor?: number;
    signal?: AbortSignal;
    sleep?: Sleep;
    logger?: Logger;
};

const defaultRetryConfig = { initialDelayMs: 1000, backoffFactor: 2 };

export const isRateLimited = (fault: ProviderFault): boolean =>
    fault.kind === "quota" || fault.status === 429;

/**
 * Retries `call` while it fails with a rate-limit fault, waiting with exponential
 * backoff in between. Any other fault, and the last rate-limit fault once the
 * retries run out, is returned unchanged.
 */
export async function retryTransient<T>(
    call: () => Promise<Result<T, ProviderFault>>,
    config: TransientRetryConfig
): Promise<Result<T, ProviderFault>> {
    const retryConfig = { ...defaultRetryConfig, ...config };
    const wait = retryConfig.sleep ?? defaultSleep;
    const log = retryConfig.logger ?? rootLogger;
    let delay = retryConfig.initialDelayMs;

    for (let attempt = 0; ; attempt++) {
        const result = await call();
        if (result.ok || !isRateLimited(result.error) || attempt >= retryConfig.maxRetries) {
            return result;
        }

        log.warn({ attempt: attempt + 1, maxRetries: retryConfig.maxRetries, delayMs: delay },
            `Rate limited ${describeFault(result.error)}. Retrying...`);
        await wait(delay, retryConfig.signal);
        delay *= retryConfig.backoffFactor;
    }
}
