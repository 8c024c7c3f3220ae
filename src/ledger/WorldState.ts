/**
 * The slice of the chaincode stub the domain needs. `ctx.stub` satisfies it
 * as is; tests supply an in-memory map.
 */
export interface WorldState {
    getState(key: string): Promise<Uint8Array>;
    putState(key: string, value: Uint8Array): Promise<void>;
}

export const keys = {
    registryConfig: () => 'registry~config',
    farmer: (identity: string) => `farmer~${identity}`,
    farmerId: (id: number) => `farmer-id~${id}`,
    practiceLogConfig: () => 'practice-log~config',
    practice: (identity: string, sequence: number) => `practice~${identity}~${sequence}`,
    practiceCount: (identity: string) => `practice-count~${identity}`,
    clock: () => 'clock',
    account: (identity: string) => `account~${identity}`,
};

export async function recordExists(state: WorldState, key: string): Promise<boolean> {
    const data = await state.getState(key);
    return !!data && data.length > 0;
}

export async function readRecord<T>(state: WorldState, key: string): Promise<T | null> {
    const data = await state.getState(key);
    if (!data || data.length === 0) return null;
    // The peer may hand back a plain Uint8Array, so wrap before decoding
    return JSON.parse(Buffer.from(data).toString('utf8'));
}

export async function writeRecord<T>(state: WorldState, key: string, value: T): Promise<void> {
    await state.putState(key, Buffer.from(JSON.stringify(value)));
}
