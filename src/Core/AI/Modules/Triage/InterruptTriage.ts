import type { CoreAI_EntityId } from '../World/IWorld'
import type { CoreAI_HostileView } from '../../TickContext'
import type { CoreAI_AbilityRole } from '../../Profiles/Catalogue'

export type CoreAI_InterruptKind = 'direct' | 'incapacitate' | 'area' | 'displace'

export interface CoreAI_InterruptAttempt {
    kind: CoreAI_InterruptKind
    role: CoreAI_AbilityRole
    /** null for the area block, which needs no target. */
    target: CoreAI_EntityId | null
}

export interface CoreAI_InterruptWindow {
    minRemaining: number
    maxRemaining: number
    meleeRange: number
    rangedRange: number
    stunEnabled: boolean
    displaceEnabled: boolean
    /** Charges of the displacement ability. */
    displacementCharges: number
}

/** The four blocking roles, in attempt order. */
export const CoreAI_INTERRUPT_ROLES: readonly CoreAI_AbilityRole[] = [
    'directBlock',
    'incapacitate',
    'areaBlock',
    'displacement',
]

const byUrgency = (a: CoreAI_HostileView, b: CoreAI_HostileView): number =>
    remainingOf(a) - remainingOf(b)

function remainingOf(h: CoreAI_HostileView): number {
    return h.activity?.remainingSec ?? 0
}

/**
 * CoreAI_InterruptTriage
 *
 * Picks blocking attempts against hostiles performing an activity.
 *
 * Attempt order:
 * 1. direct block on a blockable hostile in melee range
 * 2. incapacitate a non-blockable hostile in melee range (toggle)
 * 3. area block when two or more activities are in the window at once
 * 4. displacement on a ranged hostile, magical first; any ranged one
 *    only with two or more charges (toggle)
 *
 * Within a kind, the activity closest to completion comes first.
 */
export class CoreAI_InterruptTriage {
    /** Hostiles whose activity remaining time lies strictly inside the window. */
    static candidates(
        hostiles: readonly CoreAI_HostileView[],
        window: CoreAI_InterruptWindow
    ): CoreAI_HostileView[] {
        return hostiles.filter((h) => {
            if (!h.activity) return false

            const remaining = h.activity.remainingSec
            return remaining > window.minRemaining && remaining < window.maxRemaining
        })
    }

    static attempts(
        hostiles: readonly CoreAI_HostileView[],
        window: CoreAI_InterruptWindow
    ): CoreAI_InterruptAttempt[] {
        const active = CoreAI_InterruptTriage.candidates(hostiles, window).sort(byUrgency)
        const attempts: CoreAI_InterruptAttempt[] = []

        const melee = active.filter((h) => h.distance <= window.meleeRange)
        const ranged = active.filter(
            (h) => h.distance > window.meleeRange && h.distance <= window.rangedRange
        )

        for (const h of melee) {
            if (h.activity?.blockable) {
                attempts.push({ kind: 'direct', role: 'directBlock', target: h.id })
            }
        }

        if (window.stunEnabled) {
            for (const h of melee) {
                if (!h.activity?.blockable && !h.incapacitated) {
                    attempts.push({ kind: 'incapacitate', role: 'incapacitate', target: h.id })
                }
            }
        }

        if (active.length >= 2) {
            attempts.push({ kind: 'area', role: 'areaBlock', target: null })
        }

        if (!window.displaceEnabled) return attempts

        const magical = ranged.filter((h) => h.activity?.magical)
        const pullable =
            window.displacementCharges >= 2
                ? [...magical, ...ranged.filter((h) => !h.activity?.magical)]
                : magical
        for (const h of pullable) {
            attempts.push({ kind: 'displace', role: 'displacement', target: h.id })
        }

        return attempts
    }
}
