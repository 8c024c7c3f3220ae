import { isIdentity, isModerator, isOwner } from '../access/roles';
import { fail, ok, PracticeLogErrorCode, Result } from '../errors';
import { TxScope } from '../ledger/TxScope';
import { keys, readRecord, recordExists, WorldState, writeRecord } from '../ledger/WorldState';
import { isModerationOutcome, ModerationStatus, PracticeLogEntry } from '../models/PracticeLogEntry';
import { PracticeLogConfig } from '../models/RoleConfig';
import { isFarmerVerified } from '../registry/FarmerRegistry';

type LogResult<T> = Result<T, PracticeLogErrorCode>;

/** Read-only view of the registry that gates who may log practices. */
export interface VerificationSource {
    isVerified(identity: string): Promise<boolean>;
}

export type VerificationSourceFactory = (state: WorldState) => VerificationSource;

// Profiles live in the same world state, so the check joins the caller's transaction.
export const registryVerification: VerificationSourceFactory = (state) => ({
    isVerified: (identity) => isFarmerVerified(state, identity),
});

export async function readEntry(state: WorldState, farmer: string, sequence: number): Promise<PracticeLogEntry | null> {
    return readRecord<PracticeLogEntry>(state, keys.practice(farmer, sequence));
}

export class PracticeLog {
    constructor(
        private readonly scope: TxScope,
        private readonly verification: VerificationSource
    ) {}

    async initialize(): Promise<LogResult<PracticeLogConfig>> {
        if (await recordExists(this.scope.state, keys.practiceLogConfig())) {
            return this.reject('initialize', PracticeLogErrorCode.NotAuthorized);
        }

        await this.scope.clock.tick();
        const roles: PracticeLogConfig = {
            docType: 'practiceLogConfig',
            owner: this.scope.caller,
            moderator: this.scope.caller,
        };
        await writeRecord(this.scope.state, keys.practiceLogConfig(), roles);
        this.scope.logger.info(`practice log initialized by ${roles.owner}`);
        return ok(roles);
    }

    async log(
        practiceType: string,
        category: string,
        details: string,
        evidenceHash?: string
    ): Promise<LogResult<number>> {
        const { caller, state } = this.scope;
        if (!(await this.verification.isVerified(caller))) {
            return this.reject('log', PracticeLogErrorCode.NotVerified);
        }
        if (practiceType.length === 0 || category.length === 0 || details.length === 0) {
            return this.reject('log', PracticeLogErrorCode.InvalidInput);
        }

        const sequence = await this.getLogCount(caller);
        const entry: PracticeLogEntry = {
            docType: 'practice',
            farmer: caller,
            sequence,
            practiceType,
            category,
            timestamp: await this.scope.clock.tick(),
            details,
            evidenceHash: evidenceHash ?? null,
            moderationStatus: ModerationStatus.PENDING,
            moderationNotes: null,
            moderationTimestamp: null,
        };

        await writeRecord(state, keys.practice(caller, sequence), entry);
        await writeRecord(state, keys.practiceCount(caller), sequence + 1);

        this.scope.logger.info(`practice ${sequence} logged by ${caller}`);
        return ok(sequence);
    }

    async moderate(farmer: string, sequence: number, status: string, notes?: string): Promise<LogResult<true>> {
        const roles = await this.config();
        if (!isModerator(roles, this.scope.caller)) return this.reject('moderate', PracticeLogErrorCode.NotAuthorized);

        const entry = await readEntry(this.scope.state, farmer, sequence);
        if (!entry) return this.reject('moderate', PracticeLogErrorCode.LogNotFound);
        if (!isModerationOutcome(status)) return this.reject('moderate', PracticeLogErrorCode.InvalidInput);
        if (entry.moderationStatus !== ModerationStatus.PENDING) {
            return this.reject('moderate', PracticeLogErrorCode.AlreadyModerated);
        }

        entry.moderationStatus = status;
        entry.moderationNotes = notes ?? null;
        entry.moderationTimestamp = await this.scope.clock.tick();
        await writeRecord(this.scope.state, keys.practice(farmer, sequence), entry);

        this.scope.logger.info(`practice ${sequence} of ${farmer} ${status}`);
        return ok(true);
    }

    // Keyed by the caller, so nobody can edit another farmer's entry.
    async update(sequence: number, details: string, evidenceHash?: string): Promise<LogResult<true>> {
        const { caller, state } = this.scope;
        const entry = await readEntry(state, caller, sequence);
        if (!entry) return this.reject('update', PracticeLogErrorCode.LogNotFound);
        if (entry.moderationStatus !== ModerationStatus.PENDING) {
            return this.reject('update', PracticeLogErrorCode.AlreadyModerated);
        }

        entry.details = details;
        entry.evidenceHash = evidenceHash ?? null;
        await this.scope.clock.tick();
        await writeRecord(state, keys.practice(caller, sequence), entry);
        return ok(true);
    }

    async setModerator(moderator: string): Promise<LogResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('setModerator', PracticeLogErrorCode.NotAuthorized);
        if (!isIdentity(moderator)) return this.reject('setModerator', PracticeLogErrorCode.InvalidInput);

        await this.commitConfig({ ...roles, moderator });
        this.scope.logger.info(`moderator set to ${moderator}`);
        return ok(true);
    }

    async transferOwnership(owner: string): Promise<LogResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('transferOwnership', PracticeLogErrorCode.NotAuthorized);
        if (!isIdentity(owner)) return this.reject('transferOwnership', PracticeLogErrorCode.InvalidInput);

        await this.commitConfig({ ...roles, owner });
        this.scope.logger.info(`practice log ownership moved to ${owner}`);
        return ok(true);
    }

    async getEntry(farmer: string, sequence: number): Promise<PracticeLogEntry | null> {
        return readEntry(this.scope.state, farmer, sequence);
    }

    async getLogCount(farmer: string): Promise<number> {
        const count = await readRecord<number>(this.scope.state, keys.practiceCount(farmer));
        return count ?? 0;
    }

    // Empty until Initialize has run.
    async getOwner(): Promise<string> {
        return (await this.peekConfig())?.owner ?? '';
    }

    async getModerator(): Promise<string> {
        return (await this.peekConfig())?.moderator ?? '';
    }

    private async peekConfig(): Promise<PracticeLogConfig | null> {
        return readRecord<PracticeLogConfig>(this.scope.state, keys.practiceLogConfig());
    }

    private async config(): Promise<PracticeLogConfig> {
        const roles = await this.peekConfig();
        if (!roles) throw new Error('Practice log is not initialized');
        return roles;
    }

    private async commitConfig(roles: PracticeLogConfig): Promise<void> {
        await this.scope.clock.tick();
        await writeRecord(this.scope.state, keys.practiceLogConfig(), roles);
    }

    private reject<E extends PracticeLogErrorCode>(operation: string, code: E): { ok: false; error: E } {
        this.scope.logger.warn(`${operation} by ${this.scope.caller} rejected with ${code}`);
        return fail(code);
    }
}
