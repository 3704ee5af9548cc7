import type { CoreAI_AbilityId, CoreAI_IAbilityQueries } from '../World/IWorld'
import type {
    CoreAI_AbilityRole,
    CoreAI_Catalogue,
    CoreAI_Cost,
} from '../../Profiles/Catalogue'

/**
 * CoreAI_Ability:
 * Descriptor for one catalogued ability.
 *
 * Identity and cost come from the catalogue; learned / available /
 * charges / cooldown are read from the host when asked.
 * Casting goes through CoreAI_ActionDispatcher, never through here.
 */
export class CoreAI_Ability {
    constructor(
        public readonly role: CoreAI_AbilityRole,
        public readonly id: CoreAI_AbilityId,
        public readonly cost: Readonly<CoreAI_Cost>,
        private readonly queries: CoreAI_IAbilityQueries
    ) {}

    isLearned(): boolean {
        return this.queries.isLearned(this.id)
    }

    /** Learned and usable right now. */
    isReady(): boolean {
        return this.queries.isLearned(this.id) && this.queries.isAvailable(this.id)
    }

    charges(): number {
        return this.queries.charges(this.id)
    }

    cooldownRemaining(): number {
        return this.queries.cooldownRemaining(this.id)
    }
}

/** Descriptors keyed by role. Missing roles resolve to null. */
export class CoreAI_AbilityBook {
    private byRole: Map<CoreAI_AbilityRole, CoreAI_Ability> = new Map()

    constructor(catalogue: CoreAI_Catalogue, queries: CoreAI_IAbilityQueries) {
        for (const role of catalogue.abilityRoles()) {
            const entry = catalogue.ability(role)
            if (!entry) continue

            this.byRole.set(
                role,
                new CoreAI_Ability(role, entry.id, Object.freeze({ ...entry.cost }), queries)
            )
        }
    }

    get(role: CoreAI_AbilityRole): CoreAI_Ability | null {
        return this.byRole.get(role) ?? null
    }

    ready(role: CoreAI_AbilityRole): CoreAI_Ability | null {
        const ability = this.get(role)
        return ability && ability.isReady() ? ability : null
    }

    isLearned(role: CoreAI_AbilityRole): boolean {
        return this.get(role)?.isLearned() ?? false
    }
}
