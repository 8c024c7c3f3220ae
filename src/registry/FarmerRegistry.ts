import { isIdentity, isOwner, isVerifier } from '../access/roles';
import { config as defaults } from '../config';
import { ErrorCode, fail, ok, RegistryErrorCode, Result, TransferErrorCode } from '../errors';
import { TxScope } from '../ledger/TxScope';
import { keys, readRecord, recordExists, WorldState, writeRecord } from '../ledger/WorldState';
import {
    FarmerProfile,
    isVerificationOutcome,
    ProfilePatch,
    VerificationStatus,
} from '../models/FarmerProfile';
import { RegistryConfig } from '../models/RoleConfig';

type RegistryResult<T> = Result<T, RegistryErrorCode>;

export async function readProfile(state: WorldState, identity: string): Promise<FarmerProfile | null> {
    return readRecord<FarmerProfile>(state, keys.farmer(identity));
}

export async function isFarmerVerified(state: WorldState, identity: string): Promise<boolean> {
    const profile = await readProfile(state, identity);
    return profile !== null && profile.verificationStatus === VerificationStatus.VERIFIED;
}

/**
 * Farmer onboarding and verification. Each method checks every precondition
 * before its first write, so a rejected call leaves world state untouched even
 * outside a peer transaction.
 */
export class FarmerRegistry {
    constructor(
        private readonly scope: TxScope,
        private readonly registryAccount: string = defaults.registryAccount
    ) {}

    async initialize(registrationFee: number): Promise<RegistryResult<RegistryConfig>> {
        if (await recordExists(this.scope.state, keys.registryConfig())) {
            return this.reject('initialize', RegistryErrorCode.NotAuthorized);
        }
        if (!isFee(registrationFee)) return this.reject('initialize', RegistryErrorCode.InvalidInput);

        await this.scope.clock.tick();
        const roles: RegistryConfig = {
            docType: 'registryConfig',
            owner: this.scope.caller,
            verifier: this.scope.caller,
            registrationFee,
            contractBalance: 0,
            nextFarmerId: 1,
        };
        await this.saveConfig(roles);
        this.scope.logger.info(`registry initialized by ${roles.owner} with fee ${registrationFee}`);
        return ok(roles);
    }

    async register(
        name: string,
        location: string,
        farmSize: number,
        additionalInfo: string
    ): Promise<Result<number, RegistryErrorCode | TransferErrorCode>> {
        const { caller, state, ledger } = this.scope;
        const roles = await this.config();

        if (await recordExists(state, keys.farmer(caller))) {
            return this.reject('register', RegistryErrorCode.AlreadyRegistered);
        }
        if (name.length === 0 || location.length === 0 || !isPositive(farmSize)) {
            return this.reject('register', RegistryErrorCode.InvalidInput);
        }

        const fee = roles.registrationFee;
        if (fee > 0) {
            const paid = await ledger.transfer(caller, this.registryAccount, fee);
            if (!paid.ok) return this.reject('register', paid.error);
        }

        const id = roles.nextFarmerId;
        const profile: FarmerProfile = {
            docType: 'farmer',
            id,
            name,
            location,
            farmSize,
            registrationTimestamp: await this.scope.clock.tick(),
            verificationStatus: VerificationStatus.PENDING,
            verificationTimestamp: null,
            additionalInfo,
            active: true,
        };

        await writeRecord(state, keys.farmer(caller), profile);
        await writeRecord(state, keys.farmerId(id), caller);
        await this.saveConfig({
            ...roles,
            nextFarmerId: id + 1,
            contractBalance: roles.contractBalance + fee,
        });

        this.scope.logger.info(`farmer ${caller} registered with id ${id}`);
        return ok(id);
    }

    async verify(farmer: string, status: string): Promise<RegistryResult<true>> {
        const roles = await this.config();
        if (!isVerifier(roles, this.scope.caller)) return this.reject('verify', RegistryErrorCode.NotAuthorized);

        const profile = await readProfile(this.scope.state, farmer);
        if (!profile) return this.reject('verify', RegistryErrorCode.NotRegistered);
        if (!isVerificationOutcome(status)) return this.reject('verify', RegistryErrorCode.InvalidStatus);
        // Also covers "rejected": the decision is final either way
        if (profile.verificationStatus !== VerificationStatus.PENDING) {
            return this.reject('verify', RegistryErrorCode.AlreadyVerified);
        }

        profile.verificationStatus = status;
        profile.verificationTimestamp = await this.scope.clock.tick();
        await writeRecord(this.scope.state, keys.farmer(farmer), profile);

        this.scope.logger.info(`farmer ${farmer} marked ${status}`);
        return ok(true);
    }

    async updateProfile(patch: ProfilePatch): Promise<RegistryResult<true>> {
        const { caller, state } = this.scope;
        const profile = await readProfile(state, caller);
        if (!profile) return this.reject('updateProfile', RegistryErrorCode.NotRegistered);
        if (profile.verificationStatus !== VerificationStatus.VERIFIED) {
            return this.reject('updateProfile', RegistryErrorCode.NotVerified);
        }
        if (patch.farmSize && !isPositive(patch.farmSize)) {
            return this.reject('updateProfile', RegistryErrorCode.InvalidInput);
        }

        // A provided but empty or zero value leaves the field as it is
        if (patch.name) profile.name = patch.name;
        if (patch.location) profile.location = patch.location;
        if (patch.farmSize) profile.farmSize = patch.farmSize;
        if (patch.additionalInfo) profile.additionalInfo = patch.additionalInfo;

        await this.scope.clock.tick();
        await writeRecord(state, keys.farmer(caller), profile);
        return ok(true);
    }

    async deactivate(farmer: string): Promise<RegistryResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('deactivate', RegistryErrorCode.NotAuthorized);

        const profile = await readProfile(this.scope.state, farmer);
        if (!profile) return this.reject('deactivate', RegistryErrorCode.NotRegistered);

        profile.active = false;
        await this.scope.clock.tick();
        await writeRecord(this.scope.state, keys.farmer(farmer), profile);

        this.scope.logger.info(`farmer ${farmer} deactivated`);
        return ok(true);
    }

    async setRegistrationFee(fee: number): Promise<RegistryResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('setRegistrationFee', RegistryErrorCode.NotAuthorized);
        if (!isFee(fee)) return this.reject('setRegistrationFee', RegistryErrorCode.InvalidInput);

        await this.commitConfig({ ...roles, registrationFee: fee });
        return ok(true);
    }

    async setVerifier(verifier: string): Promise<RegistryResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('setVerifier', RegistryErrorCode.NotAuthorized);
        if (!isIdentity(verifier)) return this.reject('setVerifier', RegistryErrorCode.InvalidInput);

        await this.commitConfig({ ...roles, verifier });
        this.scope.logger.info(`verifier set to ${verifier}`);
        return ok(true);
    }

    async transferOwnership(owner: string): Promise<RegistryResult<true>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('transferOwnership', RegistryErrorCode.NotAuthorized);
        if (!isIdentity(owner)) return this.reject('transferOwnership', RegistryErrorCode.InvalidInput);

        await this.commitConfig({ ...roles, owner });
        this.scope.logger.info(`registry ownership moved to ${owner}`);
        return ok(true);
    }

    async withdrawFees(amount: number): Promise<Result<true, RegistryErrorCode | TransferErrorCode>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('withdrawFees', RegistryErrorCode.NotAuthorized);
        if (!isFee(amount) || amount > roles.contractBalance) {
            return this.reject('withdrawFees', RegistryErrorCode.InvalidInput);
        }
        if (amount === 0) return ok(true);

        const paid = await this.scope.ledger.transfer(this.registryAccount, this.scope.caller, amount);
        if (!paid.ok) return this.reject('withdrawFees', paid.error);

        await this.commitConfig({ ...roles, contractBalance: roles.contractBalance - amount });
        this.scope.logger.info(`${amount} withdrawn by ${this.scope.caller}`);
        return ok(true);
    }

    /** Owner-only top-up so an account can pay the registration fee. */
    async fundAccount(account: string, amount: number): Promise<Result<number, RegistryErrorCode | TransferErrorCode>> {
        const roles = await this.config();
        if (!isOwner(roles, this.scope.caller)) return this.reject('fundAccount', RegistryErrorCode.NotAuthorized);
        if (!isIdentity(account) || account === this.registryAccount) {
            return this.reject('fundAccount', RegistryErrorCode.InvalidInput);
        }

        const credited = await this.scope.ledger.credit(account, amount);
        if (!credited.ok) return this.reject('fundAccount', credited.error);

        await this.scope.clock.tick();
        return ok(credited.value);
    }

    async getProfile(identity: string): Promise<FarmerProfile | null> {
        return readProfile(this.scope.state, identity);
    }

    async getById(id: number): Promise<FarmerProfile | null> {
        const identity = await readRecord<string>(this.scope.state, keys.farmerId(id));
        return identity === null ? null : readProfile(this.scope.state, identity);
    }

    async isVerified(identity: string): Promise<boolean> {
        return isFarmerVerified(this.scope.state, identity);
    }

    // Role and fee reads answer empty values until Initialize has run.
    async getOwner(): Promise<string> {
        return (await this.peekConfig())?.owner ?? '';
    }

    async getVerifier(): Promise<string> {
        return (await this.peekConfig())?.verifier ?? '';
    }

    async getFee(): Promise<number> {
        return (await this.peekConfig())?.registrationFee ?? 0;
    }

    async getContractBalance(): Promise<number> {
        return (await this.peekConfig())?.contractBalance ?? 0;
    }

    async getAccountBalance(account: string): Promise<number> {
        return this.scope.ledger.balanceOf(account);
    }

    private async peekConfig(): Promise<RegistryConfig | null> {
        return readRecord<RegistryConfig>(this.scope.state, keys.registryConfig());
    }

    private async config(): Promise<RegistryConfig> {
        const roles = await this.peekConfig();
        if (!roles) throw new Error('Farmer registry is not initialized');
        return roles;
    }

    private async saveConfig(roles: RegistryConfig): Promise<void> {
        await writeRecord(this.scope.state, keys.registryConfig(), roles);
    }

    private async commitConfig(roles: RegistryConfig): Promise<void> {
        await this.scope.clock.tick();
        await this.saveConfig(roles);
    }

    private reject<E extends ErrorCode>(operation: string, code: E): { ok: false; error: E } {
        this.scope.logger.warn(`${operation} by ${this.scope.caller} rejected with ${code}`);
        return fail(code);
    }
}

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

function isFee(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
}
