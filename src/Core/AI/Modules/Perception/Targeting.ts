import type { CoreAI_EntityId } from '../World/IWorld'
import type { CoreAI_HostileView, CoreAI_TickSnapshot } from '../../TickContext'

/** Damage-over-time may be reapplied once this share of its duration is left. */
export const CoreAI_DOT_DURATION_SEC = 24
export const CoreAI_DOT_PANDEMIC_SEC = CoreAI_DOT_DURATION_SEC * 0.3

/** Extra reach granted to a manually picked ranged target. */
const MANUAL_RANGED_SLACK = 5

export function CoreAI_pickMeleeTarget(
    hostiles: readonly CoreAI_HostileView[],
    manual: CoreAI_HostileView | null,
    meleeRange: number
): CoreAI_EntityId | null {
    if (manual && manual.distance <= meleeRange) return manual.id

    let best: CoreAI_HostileView | null = null
    for (const h of hostiles) {
        if (!h.attackable || h.distance > meleeRange) continue
        if (!best || h.distance < best.distance) best = h
    }
    return best?.id ?? null
}

export function CoreAI_pickRangedTarget(
    hostiles: readonly CoreAI_HostileView[],
    manual: CoreAI_HostileView | null,
    rangedRange: number
): CoreAI_EntityId | null {
    if (manual && manual.distance <= rangedRange + MANUAL_RANGED_SLACK) return manual.id

    let best: CoreAI_HostileView | null = null
    for (const h of hostiles) {
        if (!h.attackable || h.distance > rangedRange) continue
        if (!best || h.healthPct < best.healthPct) best = h
    }
    return best?.id ?? null
}

export function CoreAI_countHostiles(snapshot: CoreAI_TickSnapshot, radius: number): number {
    let count = 0
    for (const h of snapshot.targets.hostiles) {
        if (h.attackable && h.distance <= radius) count++
    }
    return count
}

/** Attackable hostiles in radius whose damage-over-time is missing or inside the pandemic window. */
export function CoreAI_countNeedingDot(snapshot: CoreAI_TickSnapshot, radius: number): number {
    let count = 0
    for (const h of snapshot.targets.hostiles) {
        if (!h.attackable || h.distance > radius) continue
        if (h.dotRemaining <= CoreAI_DOT_PANDEMIC_SEC) count++
    }
    return count
}
