import type { CoreAI_EntityId, CoreAI_IActionPrimitive } from '../World/IWorld'
import type { CoreAI_Ability } from './Ability'
import { CoreAI_UseGate } from './UseGate'
import { CoreAI_componentLogger } from '../Debug/Logger'

export interface CoreAI_DispatchOptions {
    /** Rule or purpose label, kept for debugging. */
    label: string
    target?: CoreAI_EntityId | null
    /** Anti-double-fire interval for this ability. */
    minIntervalSec?: number
}

export interface CoreAI_DispatchRecord {
    label: string
    abilityId: number
    target: CoreAI_EntityId | null
    time: number
}

/**
 * CoreAI_ActionDispatcher:
 * Single path from the rules to the host's cast primitive.
 *
 * Responsibilities:
 * - one successful dispatch per tick
 * - per-ability minimum-interval gates
 * - remembers the last dispatch for debugging
 */
export class CoreAI_ActionDispatcher {
    private log = CoreAI_componentLogger('dispatcher')
    private gates: Map<number, CoreAI_UseGate> = new Map()

    private now: number = 0
    private dispatchedThisTick: boolean = false
    private last: CoreAI_DispatchRecord | null = null

    constructor(private readonly primitive: CoreAI_IActionPrimitive) {}

    beginTick(now: number): void {
        this.now = now
        this.dispatchedThisTick = false
    }

    get hasDispatched(): boolean {
        return this.dispatchedThisTick
    }

    get lastDispatch(): CoreAI_DispatchRecord | null {
        return this.last
    }

    /** Gate check without casting. */
    isGateOpen(ability: CoreAI_Ability, minIntervalSec: number): boolean {
        const gate = this.gates.get(ability.id)
        if (!gate) return true

        gate.setInterval(minIntervalSec)
        return gate.isOpen(this.now)
    }

    cast(ability: CoreAI_Ability, options: CoreAI_DispatchOptions): boolean {
        if (this.dispatchedThisTick) return false

        const interval = options.minIntervalSec ?? 0
        const gate = interval > 0 ? this.gateFor(ability.id, interval) : null
        if (gate && !gate.isOpen(this.now)) return false

        const target = options.target ?? null
        const ok =
            target === null
                ? this.primitive.cast(ability.id)
                : this.primitive.cast(ability.id, target)

        if (!ok) {
            this.log.debug('cast rejected', {
                label: options.label,
                abilityId: ability.id,
                target,
            })
            return false
        }

        gate?.mark(this.now)
        this.dispatchedThisTick = true
        this.last = {
            label: options.label,
            abilityId: ability.id,
            target,
            time: this.now,
        }

        this.log.debug('dispatched', {
            label: options.label,
            abilityId: ability.id,
            target,
        })

        return true
    }

    reset(): void {
        for (const gate of this.gates.values()) {
            gate.reset()
        }
        this.dispatchedThisTick = false
        this.last = null
    }

    private gateFor(abilityId: number, intervalSec: number): CoreAI_UseGate {
        let gate = this.gates.get(abilityId)
        if (!gate) {
            gate = new CoreAI_UseGate(intervalSec)
            this.gates.set(abilityId, gate)
        } else {
            gate.setInterval(intervalSec)
        }
        return gate
    }
}
