import 'reflect-metadata';
import { Context, Contract } from 'fabric-contract-api';
import type { Logger } from 'winston';
import { ContractError, ErrorCode, Result } from '../errors';
import { createScope, TxScope } from '../ledger/TxScope';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    async beforeTransaction(ctx: Context): Promise<void> {
        const { fcn } = ctx.stub.getFunctionAndParameters();
        this.getLogger(ctx).debug(`${fcn} tx=${ctx.stub.getTxID()} caller=${this.getClient(ctx).id}`);
    }

    // Helper: Get Client Identity
    protected getClient(ctx: Context) {
        const cid = ctx.clientIdentity;
        return {
            id: cid.getID(),
            mspId: cid.getMSPID(),
        };
    }

    protected getLogger(ctx: Context): Logger {
        return ctx.logging.getLogger(this.getName());
    }

    // Helper: Everything a domain component needs for this transaction
    protected openScope(ctx: Context): TxScope {
        return createScope(this.getClient(ctx).id, ctx.stub, this.getLogger(ctx));
    }

    // Helper: Throwing makes the peer discard the transaction's writes
    protected unwrap<T>(result: Result<T, ErrorCode>): T {
        if (!result.ok) throw new ContractError(result.error);
        return result.value;
    }
}
