import type { CoreAI_Collaborators, CoreAI_ITickDriver } from './Modules/World/IWorld'
import type { CoreAI_TickContext, CoreAI_TickSnapshot } from './TickContext'
import type { CoreAI_AProfile } from './Profiles/AProfile'

import { CoreAI_Perception } from './Modules/Perception/Perception'
import { CoreAI_StatusEvents } from './Modules/Perception/StatusEvents'
import { CoreAI_AbilityBook } from './Modules/Action/Ability'
import { CoreAI_ActionDispatcher } from './Modules/Action/ActionDispatcher'
import { CoreAI_ModeRouter } from './Modules/Mode/ModeRouter'
import { CoreAI_PriorityEngine } from './Modules/Rule/PriorityEngine'
import {
    CoreAI_RULE_CATEGORIES,
    type CoreAI_RuleCategory,
    type CoreAI_RuleSet,
} from './Modules/Rule/Rule'
import { CoreAI_SettingsReader } from './Profiles/Settings'
import { CoreAI_componentLogger, CoreAI_OnceWarner } from './Modules/Debug/Logger'

/** Categories held while the agent is mid-action; defensives and interrupts still run. */
const BUSY_SKIPPED: ReadonlySet<CoreAI_RuleCategory> = new Set<CoreAI_RuleCategory>([
    'utility',
    'combat',
])

export type CoreAI_TickOutcome =
    | { kind: 'skipped'; reason: 'invalid-agent' | 'error' }
    | { kind: 'idle' }
    | { kind: 'acted'; ruleSet: string; rule: string }

/**
 * CoreAI_Brain
 *
 * Tick orchestrator.
 *
 * Responsibilities:
 * - snapshot the world once per tick
 * - pick the mode
 * - evaluate Utility → Defensive → Interrupt → Combat, stop at first success
 * - hold Utility and Combat while the agent is busy
 *
 * Does NOT:
 * - read world state outside Perception
 * - cast outside the dispatcher
 */
export class CoreAI_Brain {
    public readonly abilities: CoreAI_AbilityBook
    public readonly dispatcher: CoreAI_ActionDispatcher
    public readonly engine = new CoreAI_PriorityEngine()
    public readonly statusEvents = new CoreAI_StatusEvents()

    private perception: CoreAI_Perception
    private modeRouter: CoreAI_ModeRouter
    private settingsReader = new CoreAI_SettingsReader()

    private log = CoreAI_componentLogger('brain')
    private warner = new CoreAI_OnceWarner(this.log)

    private lastSnapshot: CoreAI_TickSnapshot | null = null
    private detach: (() => void) | null = null

    constructor(
        private readonly collaborators: CoreAI_Collaborators,
        public readonly profile: CoreAI_AProfile
    ) {
        this.abilities = new CoreAI_AbilityBook(profile.catalogue, collaborators.abilities)
        this.dispatcher = new CoreAI_ActionDispatcher(collaborators.actions)
        this.perception = new CoreAI_Perception(collaborators, profile.catalogue, this.abilities)
        this.modeRouter = new CoreAI_ModeRouter(profile.probes(this.abilities))
    }

    get snapshot(): CoreAI_TickSnapshot | null {
        return this.lastSnapshot
    }

    /* ------------------------------------------------------------
     * Driver binding
     * ------------------------------------------------------------ */

    attach(driver: CoreAI_ITickDriver): void {
        this.detachDriver()
        this.detach = driver.register(() => {
            this.OngoingTick()
        })
    }

    detachDriver(): void {
        this.detach?.()
        this.detach = null
    }

    /* ------------------------------------------------------------
     * Lifecycle (death, profile switch)
     * ------------------------------------------------------------ */

    reset(): void {
        this.dispatcher.reset()
        this.engine.reset()
        this.perception.reset()
        this.modeRouter.invalidate()
        this.profile.reset()
        this.settingsReader.reset()
        this.warner.reset()
        this.lastSnapshot = null
    }

    /* ------------------------------------------------------------
     * Tick
     * ------------------------------------------------------------ */

    OngoingTick(): CoreAI_TickOutcome {
        const { world, config, clock } = this.collaborators

        try {
            if (!world.isAgentValid()) {
                return { kind: 'skipped', reason: 'invalid-agent' }
            }

            const time = clock()
            const settings = this.settingsReader.read(config)
            const mode = this.modeRouter.select(settings.modeOverride)
            const snapshot = this.perception.capture(time, settings, mode)

            this.lastSnapshot = snapshot
            this.publishStatuses(snapshot)
            this.profile.observe(snapshot.statusDiff)
            this.dispatcher.beginTick(time)

            const ctx: CoreAI_TickContext = {
                snapshot,
                abilities: this.abilities,
                dispatcher: this.dispatcher,
            }

            for (const ruleSet of this.ruleSetsFor(snapshot)) {
                if (this.engine.evaluate(ruleSet, ctx)) {
                    const fired = this.engine.lastFired
                    return {
                        kind: 'acted',
                        ruleSet: fired?.ruleSet ?? ruleSet.name,
                        rule: fired?.rule ?? '',
                    }
                }
            }

            return { kind: 'idle' }
        } catch (err) {
            this.log.warn('tick aborted by collaborator error', {
                error: err instanceof Error ? err.message : String(err),
            })
            return { kind: 'skipped', reason: 'error' }
        }
    }

    private ruleSetsFor(snapshot: CoreAI_TickSnapshot): CoreAI_RuleSet[] {
        const sets: CoreAI_RuleSet[] = []

        for (const category of CoreAI_RULE_CATEGORIES) {
            if (snapshot.busy && BUSY_SKIPPED.has(category)) continue

            if (category !== 'combat') {
                const set = this.profile.ruleSets.get(category)
                if (set) sets.push(set)
                continue
            }

            const { melee, ranged } = snapshot.targets
            if (!snapshot.inCombat || (melee === null && ranged === null)) continue

            const combat = this.profile.combatFor(snapshot)
            if (!combat) {
                this.warner.warn('no-mode', 'no capability detected, combat rules skipped')
                continue
            }

            this.warner.clear('no-mode')
            sets.push(combat)
        }

        return sets
    }

    private publishStatuses(snapshot: CoreAI_TickSnapshot): void {
        const { gained, lost } = snapshot.statusDiff
        if (gained.length > 0 || lost.length > 0) {
            this.log.info('status window change', { gained, lost })
        }

        this.statusEvents.publish(snapshot.statusDiff)
    }
}
