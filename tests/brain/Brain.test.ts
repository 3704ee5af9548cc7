import { beforeEach, describe, expect, it, vi } from 'vitest'

import { CoreAI_Brain } from '../../src/Core/AI/Brain'
import { CoreAI_GuardianProfile, type CoreAI_GuardianProfileOptions } from '../../src/Core/AI/Profiles/GuardianProfile'
import type { CoreAI_Settings } from '../../src/Core/AI/Profiles/Settings'
import {
    ID,
    ManualDriver,
    STATUS,
    TEST_CATALOGUE,
    makeRig,
    type FakeHostile,
    type FakeRig,
} from '../fixtures/FakeWorld'

function build(
    options: {
        settings?: Partial<CoreAI_Settings>
        continuous?: number
        profile?: CoreAI_GuardianProfileOptions
    } = {}
): { rig: FakeRig; brain: CoreAI_Brain } {
    const rig = makeRig({ settings: options.settings, continuous: options.continuous })
    rig.world.learnAll()
    const profile = new CoreAI_GuardianProfile(TEST_CATALOGUE, options.profile)
    return { rig, brain: new CoreAI_Brain(rig.collaborators, profile) }
}

/** Hostile that already carries the agent's damage-over-time. */
function engage(rig: FakeRig, partial: Parameters<FakeRig['world']['addHostile']>[0]): FakeHostile {
    const hostile = rig.world.addHostile(partial)
    hostile.statuses.set(STATUS.targetDot, 20)
    return hostile
}

describe('Brain tick', () => {
    it('skips the tick for an invalid agent', () => {
        const { rig, brain } = build()
        rig.world.agentValid = false

        expect(brain.OngoingTick()).toEqual({ kind: 'skipped', reason: 'invalid-agent' })
        expect(brain.snapshot).toBeNull()
    })

    it('runs utility before everything else', () => {
        const { rig, brain } = build()
        rig.world.companion = false
        rig.world.health = 40
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'utility', rule: 'utility.summon' })
        expect(rig.world.castIds()).toEqual([ID.summon])
    })

    it('mitigates before fighting', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.health = 40
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'defensive', rule: 'defensive.major' })
    })

    it('interrupts before fighting', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.addHostile({
            id: 2,
            activity: { remainingSec: 1.2, blockable: true, magical: false, targetsAgent: false },
        })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'interrupt', rule: 'interrupt.triage' })
        expect(rig.world.casts).toEqual([{ abilityId: ID.directBlock, target: 2 }])
    })

    it('leaves interrupts alone when they are turned off', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1, autoInterrupt: false } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, {
            id: 2,
            activity: { remainingSec: 1.2, blockable: true, magical: false, targetsAgent: false },
        })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'reaper.burst' })
    })

    it('skips combat without a detected mode', () => {
        const { rig, brain } = build()
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'idle' })
        expect(brain.snapshot?.mode).toEqual({ kind: 'default', source: 'none' })
        expect(rig.world.casts).toEqual([])
    })

    it('detects the mode from a probe ability', () => {
        const { rig, brain } = build()
        rig.world.learn(ID.probeReaper)
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, { id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'reaper.burst' })
        expect(brain.snapshot?.mode).toEqual({ kind: 'reaper', source: 'probe' })
    })

    it('opens with the burst on the melee target', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, { id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'reaper.burst' })
        expect(rig.world.casts).toEqual([{ abilityId: ID.burst, target: 1 }])
    })

    it('keeps the damage-over-time ahead of the mode\'s own rules', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        rig.world.unavailable.add(ID.burst)
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'combat.dotSpread' })
        expect(rig.world.castIds()).toEqual([ID.areaPulse])
    })

    it('dumps the capped pool before marking', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 }, continuous: 118 })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        rig.world.unavailable.add(ID.burst)
        engage(rig, { id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'combat.capDump' })
        expect(rig.world.casts).toEqual([{ abilityId: ID.survivalStrike, target: 1 }])
    })

    it('marks the ranged target when the burst is turned off', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1, useBurst: false } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, { id: 1 })
        engage(rig, { id: 2, distance: 20, healthPct: 40 })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'combat.reaper', rule: 'reaper.mark' })
        expect(rig.world.casts).toEqual([{ abilityId: ID.mark, target: 2 }])
    })

    it('holds utility and combat while the agent is busy', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.busy = true
        rig.world.companion = false
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, { id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'idle' })
        expect(rig.world.casts).toEqual([])

        rig.world.busy = false
        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'utility', rule: 'utility.summon' })
    })

    it('still interrupts while busy', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.busy = true
        rig.world.addHostile({
            id: 2,
            activity: { remainingSec: 1.2, blockable: true, magical: false, targetsAgent: false },
        })

        expect(brain.OngoingTick()).toEqual({ kind: 'acted', ruleSet: 'interrupt', rule: 'interrupt.triage' })
    })

    it('refreshes the buffer ahead of the rotation', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({
            kind: 'acted',
            ruleSet: 'combat.reaper',
            rule: 'combat.bufferEmergency',
        })
        expect(rig.world.castIds()).toEqual([ID.bufferRefresh])
    })

    it('keeps the heal behind its interval across ticks', () => {
        const { rig, brain } = build({
            settings: { modeOverride: 1 },
            continuous: 100,
            profile: { defensive: false },
        })
        rig.world.health = 50
        rig.world.setStatus(STATUS.buffer, 20, 6)
        engage(rig, { id: 1 })

        brain.OngoingTick()
        rig.advance(0.5)
        brain.OngoingTick()
        rig.advance(0.5)
        brain.OngoingTick()

        expect(rig.world.castIds()).toEqual([ID.survivalStrike, ID.burst, ID.survivalStrike])
    })

    it('stays out of combat rules when not in combat', () => {
        const { rig, brain } = build({ settings: { modeOverride: 1 } })
        rig.world.combat = false
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({ kind: 'idle' })
    })

    it('runs the vampiric rules on override', () => {
        const { rig, brain } = build({ settings: { modeOverride: 2 } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({
            kind: 'acted',
            ruleSet: 'combat.vampiric',
            rule: 'vampiric.essence',
        })
        expect(brain.snapshot?.mode).toEqual({ kind: 'vampiric', source: 'override' })
        expect(rig.world.casts).toEqual([{ abilityId: ID.essenceStrike, target: 1 }])
    })

    it('switches to the burst rotation while the burst window is up', () => {
        const { rig, brain } = build({ settings: { modeOverride: 2 } })
        rig.world.setStatus(STATUS.buffer, 20, 6)
        rig.world.setStatus(STATUS.essence, 10)
        rig.world.setStatus(STATUS.burstWindow, 12)
        rig.world.addHostile({ id: 1 })

        expect(brain.OngoingTick()).toEqual({
            kind: 'acted',
            ruleSet: 'combat.vampiricBurst',
            rule: 'vampiric.burstPulse',
        })
        expect(rig.world.castIds()).toEqual([ID.areaPulse])
    })

    it('turns a collaborator failure into a skipped tick', () => {
        const { rig, brain } = build()
        rig.world.throwOn = 'nearbyHostiles'

        expect(brain.OngoingTick()).toEqual({ kind: 'skipped', reason: 'error' })

        rig.world.throwOn = null
        expect(brain.OngoingTick()).toEqual({ kind: 'idle' })
    })
})

describe('Brain lifecycle', () => {
    let rig: FakeRig
    let brain: CoreAI_Brain

    beforeEach(() => {
        ;({ rig, brain } = build({
            settings: { modeOverride: 1 },
            continuous: 100,
            profile: { defensive: false },
        }))
        rig.world.health = 50
        rig.world.setStatus(STATUS.buffer, 20, 6)
        rig.world.addHostile({ id: 1 })
    })

    it('ticks from the driver until detached', () => {
        const driver = new ManualDriver()
        brain.attach(driver)
        expect(driver.listeners).toBe(1)

        driver.fire()
        expect(rig.world.castIds()).toEqual([ID.survivalStrike])

        brain.detachDriver()
        expect(driver.listeners).toBe(0)

        driver.fire()
        expect(rig.world.castIds()).toEqual([ID.survivalStrike])
    })

    it('moves to a new driver on re-attach', () => {
        const first = new ManualDriver()
        const second = new ManualDriver()

        brain.attach(first)
        brain.attach(second)

        expect(first.listeners).toBe(0)
        expect(second.listeners).toBe(1)
    })

    it('reopens gates and forgets the snapshot on reset', () => {
        brain.OngoingTick()
        rig.advance(0.5)

        brain.reset()
        expect(brain.snapshot).toBeNull()

        brain.OngoingTick()
        expect(rig.world.castIds()).toEqual([ID.survivalStrike, ID.survivalStrike])
    })

    it('publishes status changes to listeners', () => {
        const gained = vi.fn()
        const lost = vi.fn()
        brain.statusEvents.onGained(gained)
        brain.statusEvents.onLost(lost)

        brain.OngoingTick()
        expect(gained).toHaveBeenCalledTimes(1)
        expect(gained).toHaveBeenCalledWith(STATUS.buffer)

        rig.world.clearStatus(STATUS.buffer)
        brain.OngoingTick()
        expect(lost).toHaveBeenCalledWith(STATUS.buffer)
    })
})
