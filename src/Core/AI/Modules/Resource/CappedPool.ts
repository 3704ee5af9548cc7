import type { CoreAI_IContinuousPool } from '../World/IWorld'

/**
 * CoreAI_CappedPool:
 * Continuous resource clamped to [0, max].
 */
export class CoreAI_CappedPool implements CoreAI_IContinuousPool {
    private value: number

    constructor(
        private readonly cap: number,
        initial: number = 0
    ) {
        this.value = CoreAI_CappedPool.clamp(initial, cap)
    }

    amount(): number {
        return this.value
    }

    max(): number {
        return this.cap
    }

    deficit(): number {
        return this.cap - this.value
    }

    gain(amount: number): void {
        if (amount <= 0) return
        this.value = CoreAI_CappedPool.clamp(this.value + amount, this.cap)
    }

    /** Passive generation over a time step. */
    regenerate(ratePerSec: number, dtSec: number): void {
        this.gain(ratePerSec * dtSec)
    }

    spend(amount: number): boolean {
        if (amount < 0 || amount > this.value) return false
        this.value = CoreAI_CappedPool.clamp(this.value - amount, this.cap)
        return true
    }

    private static clamp(v: number, cap: number): number {
        if (!Number.isFinite(v) || v < 0) return 0
        return v > cap ? cap : v
    }
}
