import type { CoreAI_ResourceForecaster } from './ResourceForecaster'

/** Read-only view of the protective status the agent keeps up. */
export interface CoreAI_CriticalBuffer {
    readonly stacks: number
    readonly remaining: number
    readonly active: boolean
    /** Discrete slots one refresh costs. */
    readonly refreshCost: number
}

export interface CoreAI_BufferThresholds {
    minStacks: number
    refreshThreshold: number
    windowSec: number
}

export interface CoreAI_HealthState {
    healthPct: number
    predictedHealthPct: number
    continuousAmount: number
    /** Continuous amount the survival action needs. */
    survivalMinAmount: number
}

/**
 * Outcome of the emergency policy for one tick.
 *
 * - none: buffer is fine, spending unblocked
 * - refresh: refresh is affordable now
 * - survive: refresh arrives soon and health is critical, use the survival action
 * - defer: refresh arrives soon, wait for it
 * - block: refresh is out of reach, hold all discretionary discrete spending
 */
export type CoreAI_EmergencyDecision =
    | { kind: 'none' }
    | { kind: 'refresh' }
    | { kind: 'survive'; waitSec: number }
    | { kind: 'defer'; waitSec: number }
    | { kind: 'block'; waitSec: number }

export const CoreAI_NO_BUFFER: CoreAI_CriticalBuffer = Object.freeze({
    stacks: 0,
    remaining: 0,
    active: false,
    refreshCost: 0,
})

export class CoreAI_CriticalBufferGuard {
    static needsRefresh(
        buffer: CoreAI_CriticalBuffer,
        minStacks: number,
        refreshThreshold: number
    ): boolean {
        return buffer.stacks < minStacks || buffer.remaining <= refreshThreshold
    }

    static shouldBlockSpending(
        buffer: CoreAI_CriticalBuffer,
        forecaster: CoreAI_ResourceForecaster,
        thresholds: CoreAI_BufferThresholds
    ): boolean {
        return (
            CoreAI_CriticalBufferGuard.needsRefresh(
                buffer,
                thresholds.minStacks,
                thresholds.refreshThreshold
            ) && forecaster.shouldReserve(buffer.refreshCost, thresholds.windowSec)
        )
    }

    static emergencyDecision(
        buffer: CoreAI_CriticalBuffer,
        forecaster: CoreAI_ResourceForecaster,
        thresholds: CoreAI_BufferThresholds,
        health: CoreAI_HealthState
    ): CoreAI_EmergencyDecision {
        if (
            !CoreAI_CriticalBufferGuard.needsRefresh(
                buffer,
                thresholds.minStacks,
                thresholds.refreshThreshold
            )
        ) {
            return { kind: 'none' }
        }

        if (forecaster.current >= buffer.refreshCost) {
            return { kind: 'refresh' }
        }

        const waitSec = forecaster.timeUntil(buffer.refreshCost)

        if (forecaster.shouldReserve(buffer.refreshCost, thresholds.windowSec)) {
            const critical =
                health.healthPct < 60 || health.predictedHealthPct < 50

            if (critical && health.continuousAmount >= health.survivalMinAmount) {
                return { kind: 'survive', waitSec }
            }

            return { kind: 'defer', waitSec }
        }

        return { kind: 'block', waitSec }
    }

    /** Branches that hold discretionary discrete spending this tick. */
    static blocksDiscrete(decision: CoreAI_EmergencyDecision): boolean {
        return (
            decision.kind === 'survive' ||
            decision.kind === 'defer' ||
            decision.kind === 'block'
        )
    }

    /** Proactive maintenance, looser than needsRefresh. */
    static isLow(buffer: CoreAI_CriticalBuffer): boolean {
        return !buffer.active || buffer.remaining < 5 || buffer.stacks < 3
    }

    static shouldStack(stacks: number, target: number, stormActive: boolean): boolean {
        if (stormActive) return false
        return stacks < target
    }

    static isOptimal(stacks: number, optimal: number): boolean {
        return stacks >= optimal
    }
}
