/**
 * External collaborators.
 *
 * The core never acts on the world or reads it by itself.
 * Every query and the single action primitive go through these interfaces.
 *
 * Contract for implementors:
 * - every call returns synchronously, within the tick
 * - queries about an entity that no longer exists return conservative values
 *   (health 100, not attackable, no activity, no statuses)
 */

export type CoreAI_EntityId = number
export type CoreAI_AbilityId = number
export type CoreAI_StatusId = number

/** Performs an action. Returns false when the world rejects the attempt. */
export interface CoreAI_IActionPrimitive {
    cast(abilityId: CoreAI_AbilityId, target?: CoreAI_EntityId | null): boolean
}

export interface CoreAI_IAbilityQueries {
    isLearned(abilityId: CoreAI_AbilityId): boolean
    /** Cooldown, charge and range composite. */
    isAvailable(abilityId: CoreAI_AbilityId): boolean
    charges(abilityId: CoreAI_AbilityId): number
    cooldownRemaining(abilityId: CoreAI_AbilityId): number
}

/** A blockable activity (cast or channel) a hostile is performing. */
export interface CoreAI_HostileActivity {
    remainingSec: number
    /** Can be stopped by a direct block. */
    blockable: boolean
    magical: boolean
    /** The activity is aimed at the agent. */
    targetsAgent: boolean
}

export interface CoreAI_IWorldQueries {
    isAgentValid(): boolean

    /** Agent health when unit is omitted. */
    healthPct(unit?: CoreAI_EntityId): number
    predictedHealthPct(horizonSec: number): number
    /** Share of max health taken as magical damage over the horizon. */
    magicalDamageTakenPct(horizonSec: number): number
    isMagicDamageRelevant(): boolean
    alliesTakingMagicDamage(radius: number): number

    inCombat(): boolean
    isStunned(): boolean
    /** Agent is casting or channeling. */
    isBusy(): boolean
    globalCooldownSec(): number

    manualTarget(): CoreAI_EntityId | null
    nearbyHostiles(radius: number): CoreAI_EntityId[]
    isValid(entity: CoreAI_EntityId): boolean
    distanceTo(entity: CoreAI_EntityId): number
    isAttackable(entity: CoreAI_EntityId): boolean
    timeToDie(entity: CoreAI_EntityId): number
    activity(entity: CoreAI_EntityId): CoreAI_HostileActivity | null
    isIncapacitated(entity: CoreAI_EntityId): boolean
    isElite(entity: CoreAI_EntityId): boolean
    /** The agent holds any threat on the entity. */
    hasThreat(entity: CoreAI_EntityId): boolean

    /** Statuses on the agent when unit is omitted. */
    statusActive(id: CoreAI_StatusId, unit?: CoreAI_EntityId): boolean
    statusRemaining(id: CoreAI_StatusId, unit?: CoreAI_EntityId): number
    statusStackCount(id: CoreAI_StatusId, unit?: CoreAI_EntityId): number

    hasCompanion(): boolean
    /** A dead group member the host points at, eligible for revival. */
    reviveCandidate(): CoreAI_EntityId | null
    inGroupContent(): boolean
}

export interface CoreAI_IDiscretePool {
    capacity(): number
    slotsAvailable(): number
    /** Time until at least n slots are simultaneously available. */
    timeUntil(n: number): number
}

export interface CoreAI_IContinuousPool {
    amount(): number
    max(): number
    deficit(): number
}

export interface CoreAI_IConfigSource {
    getBool(key: string): boolean | undefined
    getInt(key: string): number | undefined
    getFloat(key: string): number | undefined
}

/** Invokes the registered callback once per frame. Returns an unregister function. */
export interface CoreAI_ITickDriver {
    register(callback: () => void): () => void
}

/** Monotonic clock in seconds. */
export type CoreAI_Clock = () => number

export interface CoreAI_Collaborators {
    actions: CoreAI_IActionPrimitive
    abilities: CoreAI_IAbilityQueries
    world: CoreAI_IWorldQueries
    discrete: CoreAI_IDiscretePool
    continuous: CoreAI_IContinuousPool
    config: CoreAI_IConfigSource
    clock: CoreAI_Clock
}
