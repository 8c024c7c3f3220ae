import winston from 'winston';
import { ErrorCode, Result } from '../../errors';
import { createScope, TxScope } from '../../ledger/TxScope';
import { WorldState } from '../../ledger/WorldState';

export const silentLogger = winston.createLogger({ silent: true });

/**
 * Stands in for the peer: each submitted transaction reads committed state,
 * buffers its writes and commits them only when it returns ok. Transactions
 * run one after another in submission order.
 */
export class MemoryLedger {
    private readonly committed = new Map<string, Uint8Array>();
    private queue: Promise<unknown> = Promise.resolve();

    submit<T, E extends ErrorCode>(caller: string, run: (scope: TxScope) => Promise<Result<T, E>>): Promise<Result<T, E>> {
        const next = this.queue.then(() => this.execute(caller, run));
        this.queue = next.catch(() => undefined);
        return next;
    }

    evaluate<T>(run: (scope: TxScope) => Promise<T>, caller = 'reader'): Promise<T> {
        return run(createScope(caller, this.readOnly(), silentLogger));
    }

    // Writes land immediately, with no buffering to hide partial updates.
    direct(caller: string): TxScope {
        return createScope(caller, this.unbuffered(), silentLogger);
    }

    snapshot(): Record<string, string> {
        const out: Record<string, string> = {};
        for (const [key, value] of this.committed) {
            out[key] = Buffer.from(value).toString('utf8');
        }
        return out;
    }

    private async execute<T, E extends ErrorCode>(
        caller: string,
        run: (scope: TxScope) => Promise<Result<T, E>>
    ): Promise<Result<T, E>> {
        const writes = new Map<string, Uint8Array>();
        const state: WorldState = {
            getState: async (key) => this.committed.get(key) ?? new Uint8Array(0),
            putState: async (key, value) => {
                writes.set(key, value);
            },
        };
        const result = await run(createScope(caller, state, silentLogger));
        if (result.ok) {
            for (const [key, value] of writes) this.committed.set(key, value);
        }
        return result;
    }

    private readOnly(): WorldState {
        return {
            getState: async (key) => this.committed.get(key) ?? new Uint8Array(0),
            putState: async (key) => {
                throw new Error(`write to ${key} in a read-only evaluation`);
            },
        };
    }

    private unbuffered(): WorldState {
        return {
            getState: async (key) => this.committed.get(key) ?? new Uint8Array(0),
            putState: async (key, value) => {
                this.committed.set(key, value);
            },
        };
    }
}
