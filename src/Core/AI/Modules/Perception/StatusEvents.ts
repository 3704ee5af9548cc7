import { EventEmitter } from 'events'

import type { CoreAI_StatusId } from '../World/IWorld'
import type { CoreAI_StatusDiff } from './StatusTracker'

/**
 * Event view of the per-tick status diff.
 * Listeners see exactly the entries the polling tracker produced, in order:
 *
 * - 'gained' (id)
 * - 'lost' (id)
 * - 'stacks' (id, from, to)
 */
export class CoreAI_StatusEvents extends EventEmitter {
    publish(diff: CoreAI_StatusDiff): void {
        for (const id of diff.gained) this.emit('gained', id)
        for (const id of diff.lost) this.emit('lost', id)
        for (const change of diff.stackChanged) {
            this.emit('stacks', change.id, change.from, change.to)
        }
    }

    onGained(listener: (id: CoreAI_StatusId) => void): this {
        return this.on('gained', listener)
    }

    onLost(listener: (id: CoreAI_StatusId) => void): this {
        return this.on('lost', listener)
    }

    onStacks(listener: (id: CoreAI_StatusId, from: number, to: number) => void): this {
        return this.on('stacks', listener)
    }
}
