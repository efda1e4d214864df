/**
 * Cooldown - 预防性休息
 *
 * After every `recordInterval` accepted records, pause for a random whole
 * number of minutes in [minMinutes, maxMinutes]. The pause is interruptible.
 */

import { WAIT_PROGRESS_INTERVAL_SECONDS } from '../config/constants';
import { SessionEventBus } from './event-bus';
import { CancellationToken } from './stop-signal';
import type { CooldownSettings } from '../types/config';
import { createModuleLogger } from '../utils/logger';
import { formatCountdown, interruptibleSleep, sleep } from '../utils/retry';
import type { Sleeper } from '../utils/retry';

const logger = createModuleLogger('Cooldown');

// 随机整数
function randomInt(min: number, max: number, random: () => number): number {
    return Math.floor(random() * (max - min + 1)) + min;
}

export interface CooldownDeps {
    token: CancellationToken;
    events?: SessionEventBus;
    sleeper?: Sleeper;
    random?: () => number;
}

export class Cooldown {
    private readonly sleeper: Sleeper;
    private readonly random: () => number;
    private lastBreakAt = 0;

    constructor(
        private readonly settings: CooldownSettings,
        private readonly deps: CooldownDeps
    ) {
        this.sleeper = deps.sleeper ?? sleep;
        this.random = deps.random ?? Math.random;
    }

    /**
     * Sessions resumed mid-way start counting from their restored total.
     */
    resetAt(count: number): void {
        this.lastBreakAt = count;
    }

    /**
     * Takes a break when `count` crossed the next interval boundary.
     * Returns the pause length in minutes (0 when no break was due).
     */
    async maybeRest(count: number): Promise<number> {
        const { enabled, recordInterval, minMinutes, maxMinutes } = this.settings;
        if (!enabled || recordInterval <= 0 || count - this.lastBreakAt < recordInterval) {
            return 0;
        }
        this.lastBreakAt = count;

        const minutes = randomInt(minMinutes, Math.max(minMinutes, maxMinutes), this.random);
        const message = `Taking a ${minutes}-minute break after ${count} tweets...`;
        logger.info(message, { count, minutes });
        this.deps.events?.emitStatus(message);

        await interruptibleSleep(minutes * 60, {
            shouldStop: () => this.deps.token.isCancelled,
            sleeper: this.sleeper,
            notifyEverySeconds: WAIT_PROGRESS_INTERVAL_SECONDS,
            onTick: (remaining) => this.deps.events?.emitStatus(`Break: resuming in ${formatCountdown(remaining)}`),
            operation: 'cooldown',
        });

        this.deps.events?.emitStatus('Break over, resuming...');
        return minutes;
    }
}
