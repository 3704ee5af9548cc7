import { describe, expect, it } from 'vitest'

import {
    CoreAI_ResourceForecaster,
    CoreAI_UNREACHABLE,
} from '../../src/Core/AI/Modules/Resource/ResourceForecaster'
import { CoreAI_SlotPool } from '../../src/Core/AI/Modules/Resource/SlotPool'
import type { CoreAI_IDiscretePool } from '../../src/Core/AI/Modules/World/IWorld'

/** Six empty slots; slot 0 back in 1 s, slot 1 back in `second` s, the rest in 10 s. */
function drainedPool(second: number): CoreAI_SlotPool {
    const pool = new CoreAI_SlotPool(6, 10)
    pool.consume(6)
    pool.setSlotReadyIn(0, 1)
    pool.setSlotReadyIn(1, second)
    return pool
}

describe('ResourceForecaster', () => {
    it('reserves when two slots arrive inside the window', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(drainedPool(2.5))

        expect(forecast.current).toBe(0)
        expect(forecast.timeUntil(2)).toBe(2.5)
        expect(forecast.shouldReserve(2, 3.0)).toBe(true)
    })

    it('does not reserve when the arrival is beyond the window', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(drainedPool(4.0))

        expect(forecast.timeUntil(2)).toBe(4)
        expect(forecast.shouldReserve(2, 3.0)).toBe(false)
    })

    it('never reserves what is already affordable', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(new CoreAI_SlotPool(6, 10))

        for (const window of [0, 0.5, 3, 100]) {
            expect(forecast.shouldReserve(2, window)).toBe(false)
            expect(forecast.shouldReserve(6, window)).toBe(false)
        }
    })

    it('forecasts every slot count up to capacity', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(drainedPool(2.5))

        expect(forecast.result.capacity).toBe(6)
        expect(forecast.result.timeTo).toEqual([1, 2.5, 10, 10, 10, 10])
        expect(forecast.timeUntil(6)).toBe(10)
        expect(forecast.timeUntil(7)).toBe(CoreAI_UNREACHABLE)
    })

    it('forecasts at least four counts for a small pool', () => {
        const small = new CoreAI_SlotPool(2, 10)
        small.consume(2)

        expect(CoreAI_ResourceForecaster.forecast(small).result.timeTo).toEqual([10, 10, 999, 999])
    })

    it('keeps waits non-increasing and zero once affordable as time advances', () => {
        const pool = drainedPool(4)
        pool.setSlotReadyIn(2, 6)
        pool.setSlotReadyIn(3, 7.5)

        let previous = [Infinity, Infinity, Infinity, Infinity]
        for (let t = 0; t <= 12; t += 0.5) {
            pool.setTime(t)
            const forecast = CoreAI_ResourceForecaster.forecast(pool)

            for (let n = 1; n <= 4; n++) {
                const wait = forecast.timeUntil(n)
                expect(wait).toBeLessThanOrEqual(previous[n - 1])
                if (pool.slotsAvailable() >= n) expect(wait).toBe(0)
            }
            previous = [1, 2, 3, 4].map((n) => forecast.timeUntil(n))
        }
    })

    it('returns the unreachable sentinel above capacity and beyond the horizon', () => {
        const small = new CoreAI_SlotPool(2, 10)
        small.consume(2)
        const forecast = CoreAI_ResourceForecaster.forecast(small)

        expect(forecast.timeUntil(2)).toBe(10)
        expect(forecast.timeUntil(3)).toBe(CoreAI_UNREACHABLE)
        expect(forecast.timeUntil(5)).toBe(CoreAI_UNREACHABLE)
        expect(forecast.shouldReserve(3, 1000)).toBe(false)
    })

    it('degrades to nothing affordable without a pool', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(null)

        expect(forecast.current).toBe(0)
        expect(forecast.result.timeTo).toEqual([999, 999, 999, 999])
        expect(forecast.canAffordSoon(1, 3, 1.5)).toBe(false)
    })

    it('degrades to nothing affordable when the pool throws', () => {
        const broken: CoreAI_IDiscretePool = {
            capacity: () => 6,
            slotsAvailable: () => {
                throw new Error('pool gone')
            },
            timeUntil: () => 0,
        }

        const forecast = CoreAI_ResourceForecaster.forecast(broken)

        expect(forecast.current).toBe(0)
        expect(forecast.timeUntil(1)).toBe(CoreAI_UNREACHABLE)
    })

    it('treats a zero wait for an unaffordable amount as unreachable', () => {
        const lying: CoreAI_IDiscretePool = {
            capacity: () => 6,
            slotsAvailable: () => 1,
            timeUntil: () => 0,
        }

        const forecast = CoreAI_ResourceForecaster.forecast(lying)

        expect(forecast.timeUntil(1)).toBe(0)
        expect(forecast.timeUntil(2)).toBe(CoreAI_UNREACHABLE)
    })

    it('adds one tick of slack when judging affordability', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(drainedPool(3.5))

        expect(forecast.canAffordSoon(2, 3, 1)).toBe(true)
        expect(forecast.canAffordSoon(2, 3, 0.4)).toBe(false)
        expect(forecast.canAffordSoon(0, 3, 0)).toBe(true)
    })

    it('waits for generation when a slot is ready or arrives within a tick', () => {
        const forecast = CoreAI_ResourceForecaster.forecast(drainedPool(2.5))

        expect(forecast.shouldWaitForGeneration(1.5)).toBe(true)
        expect(forecast.shouldWaitForGeneration(0.5)).toBe(false)
        expect(
            CoreAI_ResourceForecaster.forecast(new CoreAI_SlotPool(6, 10)).shouldWaitForGeneration(0)
        ).toBe(true)
    })
})
