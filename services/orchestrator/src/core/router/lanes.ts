// services/orchestrator/src/core/router/lanes.ts

/**
 * FIFO async mutex: waiters acquire in arrival order.
 */
export class Mutex {
    private locked = false
    private readonly waiters: Array<(release: () => void) => void> = []

    async acquire(): Promise<() => void> {
        if (!this.locked) {
            this.locked = true
            return () => this.release()
        }

        return await new Promise<() => void>((resolve) => {
            this.waiters.push(resolve)
        })
    }

    private release() {
        const next = this.waiters.shift()
        if (next) {
            // still locked, transfer ownership
            next(() => this.release())
            return
        }
        this.locked = false
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire()
        try {
            return await fn()
        } finally {
            release()
        }
    }
}

/**
 * One mutex per box id. Work for the same box runs in arrival order; work for
 * different boxes runs concurrently. Idle lanes are dropped.
 */
export class DeviceLanes {
    private readonly lanes = new Map<string, { mutex: Mutex; users: number }>()

    async run<T>(boxId: string, fn: () => Promise<T>): Promise<T> {
        let lane = this.lanes.get(boxId)
        if (!lane) {
            lane = { mutex: new Mutex(), users: 0 }
            this.lanes.set(boxId, lane)
        }
        lane.users++
        try {
            return await lane.mutex.runExclusive(fn)
        } finally {
            lane.users--
            if (lane.users === 0) this.lanes.delete(boxId)
        }
    }
}
