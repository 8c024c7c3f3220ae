import { config } from '../config';
import { keys, readRecord, WorldState, writeRecord } from './WorldState';

/**
 * Monotonic height kept in world state. Every mutating transaction ticks it,
 * so two concurrently endorsed mutations conflict on the `clock` key and the
 * peer commits only one of them.
 */
export class LogicalClock {
    constructor(
        private readonly state: WorldState,
        private readonly genesis: number = config.genesisHeight
    ) {}

    async now(): Promise<number> {
        const height = await readRecord<number>(this.state, keys.clock());
        return height ?? this.genesis;
    }

    // Returns the height the caller should stamp, then advances.
    async tick(): Promise<number> {
        const height = await this.now();
        await writeRecord(this.state, keys.clock(), height + 1);
        return height;
    }
}
