import type { CoreAI_EntityId, CoreAI_HostileActivity } from './Modules/World/IWorld'
import type { CoreAI_ResourceForecaster } from './Modules/Resource/ResourceForecaster'
import type {
    CoreAI_CriticalBuffer,
    CoreAI_EmergencyDecision,
} from './Modules/Resource/CriticalBufferGuard'
import type { CoreAI_StatusDiff, CoreAI_StatusState } from './Modules/Perception/StatusTracker'
import { CoreAI_INACTIVE_STATUS } from './Modules/Perception/StatusTracker'
import type { CoreAI_ModeProfile } from './Modules/Mode/ModeRouter'
import type { CoreAI_AbilityBook } from './Modules/Action/Ability'
import type { CoreAI_ActionDispatcher } from './Modules/Action/ActionDispatcher'
import type { CoreAI_Settings } from './Profiles/Settings'
import type { CoreAI_StatusRole } from './Profiles/Catalogue'

/** One hostile within scan radius, read once at tick start. */
export interface CoreAI_HostileView {
    readonly id: CoreAI_EntityId
    readonly distance: number
    readonly healthPct: number
    readonly timeToDie: number
    readonly attackable: boolean
    readonly activity: Readonly<CoreAI_HostileActivity> | null
    readonly incapacitated: boolean
    readonly elite: boolean
    readonly hasThreat: boolean
    /** Remaining time of the agent's damage-over-time on this hostile. 0 when absent. */
    readonly dotRemaining: number
}

export interface CoreAI_TargetContext {
    readonly manual: CoreAI_EntityId | null
    readonly melee: CoreAI_EntityId | null
    readonly ranged: CoreAI_EntityId | null
    /** Nearest first. */
    readonly hostiles: readonly CoreAI_HostileView[]
}

export interface CoreAI_ContinuousState {
    readonly amount: number
    readonly max: number
    readonly deficit: number
}

/**
 * CoreAI_TickSnapshot:
 * Everything the rules may read about the world for one tick.
 * Captured once at tick start and never re-read within the tick.
 */
export interface CoreAI_TickSnapshot {
    readonly time: number
    readonly settings: Readonly<CoreAI_Settings>
    readonly gcd: number

    readonly healthPct: number
    readonly predictedHealthPct: number
    readonly magicDamagePct: number
    readonly magicRelevant: boolean
    readonly alliesTakingMagic: number

    readonly inCombat: boolean
    readonly stunned: boolean
    readonly busy: boolean
    readonly hasCompanion: boolean
    readonly reviveCandidate: CoreAI_EntityId | null
    readonly inGroupContent: boolean

    readonly continuous: CoreAI_ContinuousState
    readonly forecast: CoreAI_ResourceForecaster
    readonly buffer: CoreAI_CriticalBuffer
    readonly emergency: CoreAI_EmergencyDecision
    /** Discretionary discrete spending is held this tick. */
    readonly discreteBlocked: boolean

    readonly targets: CoreAI_TargetContext
    readonly statuses: ReadonlyMap<CoreAI_StatusRole, CoreAI_StatusState>
    readonly statusDiff: CoreAI_StatusDiff

    readonly mode: CoreAI_ModeProfile
}

/**
 * CoreAI_TickContext:
 * Per-tick context passed to every rule.
 *
 * Rules must ONLY:
 * - read ctx.snapshot and ability descriptors
 * - act through ctx.dispatcher
 *
 * Rules must NOT:
 * - query the world directly
 * - reference Brain
 */
export interface CoreAI_TickContext {
    snapshot: CoreAI_TickSnapshot
    abilities: CoreAI_AbilityBook
    dispatcher: CoreAI_ActionDispatcher
}

export function CoreAI_statusOf(
    snapshot: CoreAI_TickSnapshot,
    role: CoreAI_StatusRole
): CoreAI_StatusState {
    return snapshot.statuses.get(role) ?? CoreAI_INACTIVE_STATUS
}

export function CoreAI_hostileById(
    snapshot: CoreAI_TickSnapshot,
    id: CoreAI_EntityId | null
): CoreAI_HostileView | null {
    if (id === null) return null
    return snapshot.targets.hostiles.find((h) => h.id === id) ?? null
}

/** Engaged target: melee first, then ranged, then the manual pick. */
export function CoreAI_engagedTarget(snapshot: CoreAI_TickSnapshot): CoreAI_HostileView | null {
    const { melee, ranged, manual } = snapshot.targets
    return (
        CoreAI_hostileById(snapshot, melee) ??
        CoreAI_hostileById(snapshot, ranged) ??
        CoreAI_hostileById(snapshot, manual)
    )
}
