import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { PracticeLog, registryVerification, VerificationSourceFactory } from '../practice/PracticeLog';
import { BaseContract } from './BaseContract';
import { optional, parseInteger } from './args';

@Info({ title: 'PracticeLogContract', description: 'Log and moderate sustainable farming practices' })
export class PracticeLogContract extends BaseContract {
    protected readonly verification: VerificationSourceFactory = registryVerification;

    constructor() {
        super('PracticeLogContract');
    }

    private practiceLog(ctx: Context): PracticeLog {
        return new PracticeLog(this.openScope(ctx), this.verification(ctx.stub));
    }

    @Transaction()
    async Initialize(ctx: Context): Promise<void> {
        this.unwrap(await this.practiceLog(ctx).initialize());
    }

    // evidenceHash may be empty when there is no off-chain evidence
    @Transaction()
    @Returns('number')
    async LogPractice(ctx: Context, practiceType: string, category: string, details: string, evidenceHash: string): Promise<number> {
        return this.unwrap(await this.practiceLog(ctx).log(practiceType, category, details, optional(evidenceHash)));
    }

    @Transaction()
    @Returns('boolean')
    async ModeratePractice(ctx: Context, farmer: string, sequence: string, status: string, notes: string): Promise<boolean> {
        return this.unwrap(await this.practiceLog(ctx).moderate(farmer, parseInteger(sequence), status, optional(notes)));
    }

    @Transaction()
    @Returns('boolean')
    async UpdatePractice(ctx: Context, sequence: string, details: string, evidenceHash: string): Promise<boolean> {
        return this.unwrap(await this.practiceLog(ctx).update(parseInteger(sequence), details, optional(evidenceHash)));
    }

    @Transaction()
    @Returns('boolean')
    async SetModerator(ctx: Context, moderator: string): Promise<boolean> {
        return this.unwrap(await this.practiceLog(ctx).setModerator(moderator));
    }

    @Transaction()
    @Returns('boolean')
    async TransferOwnership(ctx: Context, owner: string): Promise<boolean> {
        return this.unwrap(await this.practiceLog(ctx).transferOwnership(owner));
    }

    @Transaction(false)
    @Returns('string')
    async GetPractice(ctx: Context, farmer: string, sequence: string): Promise<string> {
        return JSON.stringify(await this.practiceLog(ctx).getEntry(farmer, parseInteger(sequence)));
    }

    @Transaction(false)
    @Returns('number')
    async GetFarmerLogCount(ctx: Context, farmer: string): Promise<number> {
        return this.practiceLog(ctx).getLogCount(farmer);
    }

    @Transaction(false)
    @Returns('string')
    async GetContractOwner(ctx: Context): Promise<string> {
        return this.practiceLog(ctx).getOwner();
    }

    @Transaction(false)
    @Returns('string')
    async GetModerator(ctx: Context): Promise<string> {
        return this.practiceLog(ctx).getModerator();
    }
}
