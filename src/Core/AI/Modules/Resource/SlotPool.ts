import type { CoreAI_IDiscretePool } from '../World/IWorld'
import { CoreAI_UNREACHABLE } from './ResourceForecaster'

/**
 * CoreAI_SlotPool:
 * Reference model of a slot-based discrete resource.
 *
 * - capacity C slots
 * - a consumed slot recharges on its own after rechargeSec
 * - time only moves forward (setTime ignores earlier values)
 *
 * Hosts that mirror a world resource can drive this model from events;
 * tests use it as the discrete pool collaborator.
 */
export class CoreAI_SlotPool implements CoreAI_IDiscretePool {
    /** Time at which each slot is (or was) ready. */
    private readyAt: number[]
    private now: number

    constructor(
        private readonly slots: number,
        private readonly rechargeSec: number,
        startTime: number = 0
    ) {
        this.now = startTime
        this.readyAt = new Array<number>(slots).fill(startTime)
    }

    setTime(now: number): void {
        if (now > this.now) {
            this.now = now
        }
    }

    time(): number {
        return this.now
    }

    capacity(): number {
        return this.slots
    }

    slotsAvailable(): number {
        let count = 0
        for (const t of this.readyAt) {
            if (t <= this.now) count++
        }
        return count
    }

    timeUntil(n: number): number {
        if (n <= 0) return 0
        if (n > this.slots) return CoreAI_UNREACHABLE

        const sorted = [...this.readyAt].sort((a, b) => a - b)
        const wait = sorted[n - 1] - this.now

        return wait > 0 ? wait : 0
    }

    /**
     * Spend n ready slots. Each starts its own recharge from now.
     * Returns false and changes nothing when fewer than n are ready.
     */
    consume(n: number): boolean {
        if (n <= 0) return true
        if (this.slotsAvailable() < n) return false

        let left = n
        for (let i = 0; i < this.readyAt.length && left > 0; i++) {
            if (this.readyAt[i] <= this.now) {
                this.readyAt[i] = this.now + this.rechargeSec
                left--
            }
        }

        return true
    }

    /** Overwrite the ready time of one slot, relative to now. */
    setSlotReadyIn(index: number, seconds: number): void {
        if (index < 0 || index >= this.slots) return
        this.readyAt[index] = this.now + Math.max(0, seconds)
    }
}
