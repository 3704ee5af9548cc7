/**
 * CoreAI_UseGate:
 * Minimum interval between two uses of one action, measured on the tick clock.
 * The last-use timestamp is the only state it keeps across ticks.
 */
export class CoreAI_UseGate {
    protected intervalSec: number
    private lastUse: number = -Infinity

    constructor(intervalSec: number = 0) {
        this.intervalSec = intervalSec
    }

    setInterval(intervalSec: number): void {
        this.intervalSec = Math.max(0, intervalSec)
    }

    isOpen(now: number): boolean {
        if (this.intervalSec <= 0) return true
        return now - this.lastUse >= this.intervalSec
    }

    mark(now: number): void {
        this.lastUse = now
    }

    reset(): void {
        this.lastUse = -Infinity
    }
}
