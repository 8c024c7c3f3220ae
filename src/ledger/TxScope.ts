import type { Logger } from 'winston';
import { LogicalClock } from './LogicalClock';
import { ValueLedger } from './ValueLedger';
import { WorldState } from './WorldState';

/** Everything one transaction runs against. */
export interface TxScope {
    caller: string;
    state: WorldState;
    clock: LogicalClock;
    ledger: ValueLedger;
    logger: Logger;
}

export function createScope(caller: string, state: WorldState, logger: Logger): TxScope {
    return {
        caller,
        state,
        clock: new LogicalClock(state),
        ledger: new ValueLedger(state),
        logger,
    };
}
