/**
 * CoreAI_SpendPolicy:
 * Decisions about the continuous capped pool.
 *
 * Thresholds come from the settings snapshot. All functions are pure.
 */

export interface CoreAI_SpendInputs {
    amount: number
    deficit: number
    healthPct: number
    predictedHealthPct: number
    burstActive: boolean
    burstLearned: boolean
    burstCooldownSec: number
}

export interface CoreAI_SpendThresholds {
    cappingThreshold: number
    poolingThreshold: number
    aggressiveSpending: boolean
}

/** Burst ability comes back within this many seconds. */
const BURST_SOON_SEC = 15

export class CoreAI_SpendPolicy {
    static shouldPoolForBurst(inputs: CoreAI_SpendInputs): boolean {
        if (!inputs.burstLearned || inputs.burstActive) return false

        return inputs.burstCooldownSec > 0 && inputs.burstCooldownSec <= BURST_SOON_SEC
    }

    static shouldPoolForEmergency(
        inputs: CoreAI_SpendInputs,
        thresholds: CoreAI_SpendThresholds
    ): boolean {
        if (inputs.amount < thresholds.poolingThreshold) return true

        const endangered = inputs.healthPct < 60 || inputs.predictedHealthPct < 50
        return endangered && inputs.amount < thresholds.poolingThreshold + 30
    }

    /** Remaining room below max at which the pool counts as capping. */
    static cappingThreshold(
        burstActive: boolean,
        burstSoon: boolean,
        thresholds: CoreAI_SpendThresholds
    ): number {
        let threshold = thresholds.cappingThreshold

        if (thresholds.aggressiveSpending) threshold -= 5
        if (burstActive) threshold += 10
        if (burstSoon) threshold += 20

        return threshold
    }

    static isCapping(deficit: number, threshold: number): boolean {
        return deficit < threshold
    }

    static shouldSpend(
        cost: number,
        inputs: CoreAI_SpendInputs,
        thresholds: CoreAI_SpendThresholds
    ): boolean {
        if (inputs.amount < cost) return false

        const poolingForBurst = CoreAI_SpendPolicy.shouldPoolForBurst(inputs)
        if (poolingForBurst) {
            const threshold = CoreAI_SpendPolicy.cappingThreshold(
                inputs.burstActive,
                poolingForBurst,
                thresholds
            )
            if (!CoreAI_SpendPolicy.isCapping(inputs.deficit, threshold)) return false
        }

        if (
            CoreAI_SpendPolicy.shouldPoolForEmergency(inputs, thresholds) &&
            inputs.healthPct >= 40
        ) {
            return false
        }

        return true
    }
}
