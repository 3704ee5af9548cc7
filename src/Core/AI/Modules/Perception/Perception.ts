import type {
    CoreAI_EntityId,
    CoreAI_IContinuousPool,
    CoreAI_IDiscretePool,
    CoreAI_IWorldQueries,
    CoreAI_StatusId,
} from '../World/IWorld'
import type { CoreAI_HostileView, CoreAI_TargetContext, CoreAI_TickSnapshot } from '../../TickContext'
import type { CoreAI_Settings } from '../../Profiles/Settings'
import type { CoreAI_Catalogue, CoreAI_StatusRole } from '../../Profiles/Catalogue'
import type { CoreAI_AbilityBook } from '../Action/Ability'
import type { CoreAI_ModeProfile } from '../Mode/ModeRouter'

import { CoreAI_ResourceForecaster } from '../Resource/ResourceForecaster'
import {
    type CoreAI_CriticalBuffer,
    CoreAI_CriticalBufferGuard,
    CoreAI_NO_BUFFER,
} from '../Resource/CriticalBufferGuard'
import { type CoreAI_StatusState, CoreAI_StatusTracker } from './StatusTracker'
import { CoreAI_pickMeleeTarget, CoreAI_pickRangedTarget } from './Targeting'

export interface CoreAI_PerceptionSources {
    world: CoreAI_IWorldQueries
    discrete: CoreAI_IDiscretePool
    continuous: CoreAI_IContinuousPool
}

/**
 * CoreAI_Perception
 *
 * Builds the tick snapshot. The only place that reads world state.
 *
 * Responsibilities:
 * - agent state, pools, forecasts
 * - status polling and diff
 * - hostile scan and target picks
 * - critical buffer emergency decision
 */
export class CoreAI_Perception {
    private tracker = new CoreAI_StatusTracker()
    private watched: { role: CoreAI_StatusRole; id: CoreAI_StatusId }[] = []

    constructor(
        private readonly sources: CoreAI_PerceptionSources,
        private readonly catalogue: CoreAI_Catalogue,
        private readonly abilities: CoreAI_AbilityBook
    ) {
        for (const role of catalogue.statusRoles()) {
            if (role === 'targetDot') continue

            const id = catalogue.status(role)
            if (id !== null) this.watched.push({ role, id })
        }
    }

    capture(
        time: number,
        settings: Readonly<CoreAI_Settings>,
        mode: CoreAI_ModeProfile
    ): CoreAI_TickSnapshot {
        const { world, discrete, continuous } = this.sources

        const statuses = this.pollStatuses()
        const targets = this.scanTargets(settings)

        const forecast = CoreAI_ResourceForecaster.forecast(discrete)
        const pool = {
            amount: continuous.amount(),
            max: continuous.max(),
            deficit: continuous.deficit(),
        }

        const healthPct = world.healthPct()
        const predictedHealthPct = world.predictedHealthPct(settings.predictionHorizon)

        const buffer = this.readBuffer(statuses.states)
        const emergency =
            buffer === CoreAI_NO_BUFFER
                ? { kind: 'none' as const }
                : CoreAI_CriticalBufferGuard.emergencyDecision(
                      buffer,
                      forecast,
                      {
                          minStacks: settings.bufferMinStacks,
                          refreshThreshold: settings.bufferRefreshThreshold,
                          windowSec: settings.forecastWindow,
                      },
                      {
                          healthPct,
                          predictedHealthPct,
                          continuousAmount: pool.amount,
                          survivalMinAmount: settings.survivalMinAmount,
                      }
                  )

        const byRole = new Map<CoreAI_StatusRole, CoreAI_StatusState>()
        for (const { role, id } of this.watched) {
            const state = statuses.states.get(id)
            if (state) byRole.set(role, state)
        }

        return Object.freeze({
            time,
            settings,
            gcd: world.globalCooldownSec(),

            healthPct,
            predictedHealthPct,
            magicDamagePct: world.magicalDamageTakenPct(settings.predictionHorizon),
            magicRelevant: world.isMagicDamageRelevant(),
            alliesTakingMagic: world.alliesTakingMagicDamage(settings.rangedRange),

            inCombat: world.inCombat(),
            stunned: world.isStunned(),
            busy: world.isBusy(),
            hasCompanion: world.hasCompanion(),
            reviveCandidate: world.reviveCandidate(),
            inGroupContent: world.inGroupContent(),

            continuous: Object.freeze(pool),
            forecast,
            buffer,
            emergency,
            discreteBlocked: CoreAI_CriticalBufferGuard.blocksDiscrete(emergency),

            targets,
            statuses: byRole,
            statusDiff: statuses.diff,

            mode,
        })
    }

    reset(): void {
        this.tracker.reset()
    }

    /* ------------------------------------------------------------
     * Statuses
     * ------------------------------------------------------------ */

    private pollStatuses() {
        const { world } = this.sources
        const ids = [...new Set(this.watched.map((w) => w.id))]

        return this.tracker.poll(ids, (id) => {
            const active = world.statusActive(id)
            return {
                active,
                remaining: active ? Math.max(0, world.statusRemaining(id)) : 0,
                stacks: active ? Math.max(0, world.statusStackCount(id)) : 0,
            }
        })
    }

    private readBuffer(
        states: ReadonlyMap<CoreAI_StatusId, CoreAI_StatusState>
    ): CoreAI_CriticalBuffer {
        const id = this.catalogue.status('buffer')
        const refresh = this.abilities.get('bufferRefresh')
        if (id === null || !refresh) return CoreAI_NO_BUFFER

        const state = states.get(id)
        return {
            stacks: state?.stacks ?? 0,
            remaining: state?.remaining ?? 0,
            active: state?.active ?? false,
            refreshCost: refresh.cost.discrete,
        }
    }

    /* ------------------------------------------------------------
     * Targets
     * ------------------------------------------------------------ */

    private scanTargets(settings: Readonly<CoreAI_Settings>): CoreAI_TargetContext {
        const { world } = this.sources
        const hostiles: CoreAI_HostileView[] = []
        const seen = new Set<CoreAI_EntityId>()

        for (const id of world.nearbyHostiles(settings.scanRadius)) {
            if (seen.has(id) || !world.isValid(id)) continue
            seen.add(id)
            hostiles.push(this.viewOf(id))
        }

        let manual: CoreAI_HostileView | null = null
        const manualId = world.manualTarget()
        if (manualId !== null && world.isValid(manualId) && world.isAttackable(manualId)) {
            manual = hostiles.find((h) => h.id === manualId) ?? this.viewOf(manualId)
            if (!seen.has(manualId)) hostiles.push(manual)
        }

        hostiles.sort((a, b) => a.distance - b.distance)

        return Object.freeze({
            manual: manual?.id ?? null,
            melee: CoreAI_pickMeleeTarget(hostiles, manual, settings.meleeRange),
            ranged: CoreAI_pickRangedTarget(hostiles, manual, settings.rangedRange),
            hostiles: Object.freeze(hostiles),
        })
    }

    private viewOf(id: CoreAI_EntityId): CoreAI_HostileView {
        const { world } = this.sources
        const dotId = this.catalogue.status('targetDot')
        const activity = world.activity(id)

        return Object.freeze({
            id,
            distance: world.distanceTo(id),
            healthPct: world.healthPct(id),
            timeToDie: world.timeToDie(id),
            attackable: world.isAttackable(id),
            activity: activity ? Object.freeze({ ...activity }) : null,
            incapacitated: world.isIncapacitated(id),
            elite: world.isElite(id),
            hasThreat: world.hasThreat(id),
            dotRemaining:
                dotId !== null && world.statusActive(dotId, id)
                    ? world.statusRemaining(dotId, id)
                    : 0,
        })
    }
}
