import { z } from 'zod'

import type { CoreAI_AbilityId, CoreAI_StatusId } from '../Modules/World/IWorld'
import { CoreAI_ConfigError, CoreAI_formatIssues } from './Settings'

/**
 * Functional roles the rule sets refer to.
 * The host maps each role it supports onto a concrete ability or status id.
 */
export const CoreAI_ABILITY_ROLES = [
    // buffer
    'bufferRefresh',
    'rangedBufferRefresh',
    'bufferConsumer',
    'storm',

    // rotation
    'survivalStrike',
    'areaPulse',
    'fillerStrike',
    'groundZone',
    'burst',
    'drain',
    'mark',
    'execute',
    'essenceStrike',

    // interrupts
    'directBlock',
    'incapacitate',
    'areaBlock',
    'displacement',

    // defensives
    'shield',
    'zoneShield',
    'majorMitigation',
    'strongMitigation',
    'weakMitigation',
    'emergencyHeal',

    // utility
    'summon',
    'revive',
    'taunt',
    'consumable',

    // capability probes
    'probeReaper',
    'probeVampiric',
] as const

export const CoreAI_STATUS_ROLES = [
    'buffer',
    'burstWindow',
    'zone',
    'storm',
    'markWindow',
    'empowered',
    'freeZoneProc',
    'essence',
    'shield',
    'majorMitigation',
    'strongMitigation',
    'targetDot',
] as const

export type CoreAI_AbilityRole = (typeof CoreAI_ABILITY_ROLES)[number]
export type CoreAI_StatusRole = (typeof CoreAI_STATUS_ROLES)[number]

const CostSchema = z.object({
    discrete: z.number().int().min(0).max(10).default(0),
    continuous: z.number().min(0).max(1000).default(0),
})

const AbilityEntrySchema = z.object({
    id: z.number().int().positive(),
    cost: CostSchema.default({}),
})

export const CoreAI_CatalogueSchema = z.object({
    abilities: z.record(z.enum(CoreAI_ABILITY_ROLES), AbilityEntrySchema).default({}),
    statuses: z.record(z.enum(CoreAI_STATUS_ROLES), z.number().int().positive()).default({}),
})

export type CoreAI_Cost = z.infer<typeof CostSchema>
export type CoreAI_AbilityEntry = z.infer<typeof AbilityEntrySchema>
export type CoreAI_CatalogueInput = z.input<typeof CoreAI_CatalogueSchema>

/**
 * CoreAI_Catalogue:
 * Validated role → id mapping. Roles the host leaves out resolve to null
 * and the rules using them never fire.
 */
export class CoreAI_Catalogue {
    private abilities: Map<CoreAI_AbilityRole, CoreAI_AbilityEntry> = new Map()
    private statuses: Map<CoreAI_StatusRole, CoreAI_StatusId> = new Map()

    constructor(input: CoreAI_CatalogueInput) {
        const result = CoreAI_CatalogueSchema.safeParse(input)
        if (!result.success) {
            throw new CoreAI_ConfigError(
                `Invalid catalogue: ${CoreAI_formatIssues(result.error.issues)}`,
                result.error.issues
            )
        }

        for (const role of CoreAI_ABILITY_ROLES) {
            const entry = result.data.abilities[role]
            if (entry) this.abilities.set(role, entry)
        }

        for (const role of CoreAI_STATUS_ROLES) {
            const id = result.data.statuses[role]
            if (id !== undefined) this.statuses.set(role, id)
        }
    }

    ability(role: CoreAI_AbilityRole): CoreAI_AbilityEntry | null {
        return this.abilities.get(role) ?? null
    }

    abilityId(role: CoreAI_AbilityRole): CoreAI_AbilityId | null {
        return this.abilities.get(role)?.id ?? null
    }

    status(role: CoreAI_StatusRole): CoreAI_StatusId | null {
        return this.statuses.get(role) ?? null
    }

    abilityRoles(): CoreAI_AbilityRole[] {
        return [...this.abilities.keys()]
    }

    /** Status roles the host mapped, in declaration order. */
    statusRoles(): CoreAI_StatusRole[] {
        return [...this.statuses.keys()]
    }
}
