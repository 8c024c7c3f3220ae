import { fail, ok, Result, TransferErrorCode } from '../errors';
import { keys, readRecord, WorldState, writeRecord } from './WorldState';

interface Account {
    docType: 'account';
    owner: string;
    balance: number;
}

/** Integer balances per identity. A failed transfer writes nothing. */
export class ValueLedger {
    constructor(private readonly state: WorldState) {}

    async balanceOf(owner: string): Promise<number> {
        const account = await readRecord<Account>(this.state, keys.account(owner));
        return account ? account.balance : 0;
    }

    async credit(owner: string, amount: number): Promise<Result<number, TransferErrorCode>> {
        if (!Number.isInteger(amount) || amount <= 0) return fail(TransferErrorCode.NonPositiveAmount);

        const balance = (await this.balanceOf(owner)) + amount;
        await this.store(owner, balance);
        return ok(balance);
    }

    async transfer(from: string, to: string, amount: number): Promise<Result<true, TransferErrorCode>> {
        if (!Number.isInteger(amount) || amount <= 0) return fail(TransferErrorCode.NonPositiveAmount);
        if (from === to) return fail(TransferErrorCode.SenderIsRecipient);

        const fromBalance = await this.balanceOf(from);
        if (fromBalance < amount) return fail(TransferErrorCode.InsufficientFunds);
        const toBalance = await this.balanceOf(to);

        await this.store(from, fromBalance - amount);
        await this.store(to, toBalance + amount);
        return ok(true);
    }

    private async store(owner: string, balance: number): Promise<void> {
        const account: Account = { docType: 'account', owner, balance };
        await writeRecord(this.state, keys.account(owner), account);
    }
}
