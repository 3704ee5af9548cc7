import { beforeEach, describe, expect, it } from 'vitest'

import { CoreAI_PriorityEngine } from '../../src/Core/AI/Modules/Rule/PriorityEngine'
import { CoreAI_RuleSet } from '../../src/Core/AI/Modules/Rule/Rule'
import { CoreAI_utilityRules } from '../../src/Core/AI/Profiles/Rules/Utility'
import type { CoreAI_Settings } from '../../src/Core/AI/Profiles/Settings'
import { ID, makeHarness, makeRig, type FakeRig, type RuleHarness } from '../fixtures/FakeWorld'

describe('utility rules', () => {
    let rig: FakeRig
    let harness: RuleHarness
    const rules = new CoreAI_RuleSet('utility', 'utility', CoreAI_utilityRules())

    const setup = (settings: Partial<CoreAI_Settings> = {}): void => {
        rig = makeRig({ settings })
        rig.world.learnAll()
        harness = makeHarness(rig)
    }

    const run = (): boolean => new CoreAI_PriorityEngine().evaluate(rules, harness.tick())

    beforeEach(() => setup())

    it('revives the candidate the host points at', () => {
        rig.world.revive = 9

        expect(run()).toBe(true)
        expect(rig.world.casts).toEqual([{ abilityId: ID.revive, target: 9 }])
    })

    it('taunts a loose hostile in group content', () => {
        rig.world.group = true
        rig.world.addHostile({ id: 1, distance: 10, hasThreat: false })

        expect(run()).toBe(true)
        expect(rig.world.casts).toEqual([{ abilityId: ID.taunt, target: 1 }])
    })

    it('pulls the hostile in when the taunt is down', () => {
        rig.world.group = true
        rig.world.unavailable.add(ID.taunt)
        rig.world.addHostile({ id: 1, distance: 10, hasThreat: false })

        expect(run()).toBe(true)
        expect(rig.world.casts).toEqual([{ abilityId: ID.displacement, target: 1 }])
    })

    it('pulls with displacement alone when the taunt is turned off', () => {
        setup({ useTaunt: false })
        rig.world.group = true
        rig.world.addHostile({ id: 1, distance: 10, hasThreat: false })

        expect(run()).toBe(true)
        expect(rig.world.casts).toEqual([{ abilityId: ID.displacement, target: 1 }])
    })

    it('leaves revives to the player when they are turned off', () => {
        setup({ useRevive: false })
        rig.world.revive = 9

        expect(run()).toBe(false)
    })

    it('leaves elites and solo play alone', () => {
        rig.world.addHostile({ id: 1, distance: 10, hasThreat: false })
        expect(run()).toBe(false)

        rig.world.group = true
        rig.world.hostiles.clear()
        rig.world.addHostile({ id: 2, distance: 10, hasThreat: false, elite: true })
        expect(run()).toBe(false)
    })

    it('uses the consumable at most once per interval', () => {
        setup({ useConsumable: true })
        rig.world.health = 30

        expect(run()).toBe(true)
        rig.advance(10)
        expect(run()).toBe(false)
        rig.advance(50)
        expect(run()).toBe(true)

        expect(rig.world.castIds()).toEqual([ID.consumable, ID.consumable])
    })
})
