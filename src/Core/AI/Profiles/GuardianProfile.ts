import type { CoreAI_TickSnapshot } from '../TickContext'
import { CoreAI_statusOf } from '../TickContext'
import { CoreAI_RuleSet } from '../Modules/Rule/Rule'
import type { CoreAI_ModeProbe } from '../Modules/Mode/ModeRouter'
import type { CoreAI_AbilityBook } from '../Modules/Action/Ability'
import { CoreAI_WindowTracker } from '../Modules/Perception/WindowTracker'

import { CoreAI_AProfile } from './AProfile'
import { CoreAI_Catalogue, type CoreAI_CatalogueInput } from './Catalogue'
import { CoreAI_utilityRules } from './Rules/Utility'
import { CoreAI_defensiveRules } from './Rules/Defensive'
import { CoreAI_interruptRules } from './Rules/Interrupt'
import { CoreAI_COMBAT_OPENERS, CoreAI_sharedRotation } from './Rules/CombatShared'
import { CoreAI_reaperRotation } from './Rules/ReaperCombat'
import { CoreAI_vampiricBurstRules, CoreAI_vampiricRules } from './Rules/VampiricCombat'

export interface CoreAI_GuardianProfileOptions {
    utility?: boolean
    defensive?: boolean
    interrupt?: boolean
}

/**
 * CoreAI_GuardianProfile
 *
 * Tank-style agent: keeps its critical buffer up, mitigates, interrupts,
 * then runs the rotation of whichever mode was detected.
 */
export class CoreAI_GuardianProfile extends CoreAI_AProfile {
    private reaper: CoreAI_RuleSet
    private vampiric: CoreAI_RuleSet
    private vampiricBurst: CoreAI_RuleSet

    constructor(
        catalogue: CoreAI_Catalogue | CoreAI_CatalogueInput,
        options: CoreAI_GuardianProfileOptions = {}
    ) {
        super(catalogue instanceof CoreAI_Catalogue ? catalogue : new CoreAI_Catalogue(catalogue))

        this.addRuleSetIf(
            options.utility,
            'utility',
            () => new CoreAI_RuleSet('utility', 'utility', CoreAI_utilityRules())
        )
        this.addRuleSetIf(
            options.defensive,
            'defensive',
            () => new CoreAI_RuleSet('defensive', 'defensive', CoreAI_defensiveRules())
        )
        this.addRuleSetIf(
            options.interrupt,
            'interrupt',
            () => new CoreAI_RuleSet('interrupt', 'interrupt', CoreAI_interruptRules())
        )

        const burstWindow = this.track(
            new CoreAI_WindowTracker('burstWindowPulse', this.catalogue.status('burstWindow'))
        )
        this.reaper = CoreAI_RuleSet.compose(
            'combat.reaper',
            'combat',
            CoreAI_COMBAT_OPENERS,
            CoreAI_reaperRotation(burstWindow)
        )
        this.vampiric = CoreAI_RuleSet.compose(
            'combat.vampiric',
            'combat',
            CoreAI_COMBAT_OPENERS,
            CoreAI_vampiricRules(),
            CoreAI_sharedRotation(burstWindow)
        )
        this.vampiricBurst = CoreAI_RuleSet.compose(
            'combat.vampiricBurst',
            'combat',
            CoreAI_COMBAT_OPENERS,
            CoreAI_vampiricBurstRules()
        )
    }

    combatFor(snapshot: CoreAI_TickSnapshot): CoreAI_RuleSet | null {
        switch (snapshot.mode.kind) {
            case 'reaper':
                return this.reaper
            case 'vampiric':
                return CoreAI_statusOf(snapshot, 'burstWindow').active
                    ? this.vampiricBurst
                    : this.vampiric
            case 'default':
                return null
        }
    }

    probes(abilities: CoreAI_AbilityBook): CoreAI_ModeProbe[] {
        return [
            { mode: 'reaper', detect: () => abilities.isLearned('probeReaper') },
            { mode: 'vampiric', detect: () => abilities.isLearned('probeVampiric') },
        ]
    }
}
