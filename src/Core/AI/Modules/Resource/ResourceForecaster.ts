import type { CoreAI_IDiscretePool } from '../World/IWorld'
import { CoreAI_componentLogger } from '../Debug/Logger'

/** Sentinel wait for an amount the pool cannot reach. */
export const CoreAI_UNREACHABLE = 999

/** Minimum number of slot counts forecast per tick; larger pools are covered up to capacity. */
export const CoreAI_FORECAST_HORIZON = 4

export interface CoreAI_ForecastResult {
    readonly current: number
    readonly capacity: number
    /** timeTo[n - 1]: seconds until n slots are available, for n up to max(horizon, capacity). */
    readonly timeTo: readonly number[]
}

const log = CoreAI_componentLogger('forecaster')

/**
 * CoreAI_ResourceForecaster
 *
 * Immutable projection of the discrete pool for one tick.
 *
 * - timeUntil(n) is 0 when already affordable, positive when affordable
 *   later, CoreAI_UNREACHABLE when the pool cannot reach n
 * - never throws; a missing or failing pool reads as "nothing affordable"
 */
export class CoreAI_ResourceForecaster {
    private constructor(public readonly result: CoreAI_ForecastResult) {}

    static forecast(
        pool: CoreAI_IDiscretePool | null,
        horizon: number = CoreAI_FORECAST_HORIZON
    ): CoreAI_ResourceForecaster {
        if (!pool) {
            return CoreAI_ResourceForecaster.empty(horizon)
        }

        try {
            const capacity = Math.max(0, Math.floor(pool.capacity()))
            const current = Math.min(
                capacity,
                Math.max(0, Math.floor(pool.slotsAvailable()))
            )

            const span = Math.max(horizon, capacity)
            const timeTo: number[] = []
            for (let n = 1; n <= span; n++) {
                if (current >= n) {
                    timeTo.push(0)
                } else if (n > capacity) {
                    timeTo.push(CoreAI_UNREACHABLE)
                } else {
                    timeTo.push(sanitizeWait(pool.timeUntil(n)))
                }
            }

            return new CoreAI_ResourceForecaster(
                Object.freeze({
                    current,
                    capacity,
                    timeTo: Object.freeze(timeTo),
                })
            )
        } catch (err) {
            log.warn('discrete pool query failed, forecasting nothing affordable', {
                error: err instanceof Error ? err.message : String(err),
            })
            return CoreAI_ResourceForecaster.empty(horizon)
        }
    }

    static empty(horizon: number = CoreAI_FORECAST_HORIZON): CoreAI_ResourceForecaster {
        return new CoreAI_ResourceForecaster(
            Object.freeze({
                current: 0,
                capacity: 0,
                timeTo: Object.freeze(
                    new Array<number>(horizon).fill(CoreAI_UNREACHABLE)
                ),
            })
        )
    }

    get current(): number {
        return this.result.current
    }

    /** Every count past timeTo.length is above capacity. */
    timeUntil(n: number): number {
        if (n <= 0 || this.result.current >= n) return 0
        if (n > this.result.timeTo.length) return CoreAI_UNREACHABLE

        return this.result.timeTo[n - 1]
    }

    /**
     * Withhold spending because `needed` arrives within the window.
     * False when already affordable and when the arrival is beyond the window.
     */
    shouldReserve(needed: number, windowSec: number): boolean {
        if (this.result.current >= needed) return false

        const wait = this.timeUntil(needed)
        return isReachable(wait) && wait <= windowSec
    }

    /** Affordable now, or within the window plus one tick of dispatch lag. */
    canAffordSoon(needed: number, windowSec: number, tickSec: number): boolean {
        if (this.result.current >= needed) return true

        const wait = this.timeUntil(needed)
        return isReachable(wait) && wait <= windowSec + tickSec
    }

    /** Slots are ready or one arrives within a tick, so generation is imminent. */
    shouldWaitForGeneration(tickSec: number): boolean {
        if (this.result.current >= 1) return true

        const wait = this.timeUntil(1)
        return isReachable(wait) && wait <= tickSec
    }
}

function isReachable(wait: number): boolean {
    return wait > 0 && wait < CoreAI_UNREACHABLE
}

function sanitizeWait(raw: number): number {
    if (!Number.isFinite(raw) || raw <= 0) return CoreAI_UNREACHABLE
    return Math.min(raw, CoreAI_UNREACHABLE)
}
