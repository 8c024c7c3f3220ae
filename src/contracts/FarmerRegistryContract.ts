import { Context, Info, Returns, Transaction } from 'fabric-contract-api';
import { config } from '../config';
import { ContractError, RegistryErrorCode } from '../errors';
import { FarmerRegistry } from '../registry/FarmerRegistry';
import { BaseContract } from './BaseContract';
import { parseInteger, parseNumber, parseProfilePatch } from './args';

@Info({ title: 'FarmerRegistryContract', description: 'Register and verify farmers' })
export class FarmerRegistryContract extends BaseContract {
    constructor() {
        super('FarmerRegistryContract');
    }

    private registry(ctx: Context): FarmerRegistry {
        return new FarmerRegistry(this.openScope(ctx));
    }

    @Transaction()
    async Initialize(ctx: Context): Promise<void> {
        this.unwrap(await this.registry(ctx).initialize(config.registrationFee));
    }

    @Transaction()
    @Returns('number')
    async RegisterFarmer(ctx: Context, name: string, location: string, farmSize: string, additionalInfo: string): Promise<number> {
        return this.unwrap(await this.registry(ctx).register(name, location, parseNumber(farmSize), additionalInfo));
    }

    @Transaction()
    @Returns('boolean')
    async VerifyFarmer(ctx: Context, farmer: string, status: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).verify(farmer, status));
    }

    // patchJson: e.g. '{"name":"New Name","farmSize":150}'; omitted keys are kept
    @Transaction()
    @Returns('boolean')
    async UpdateProfile(ctx: Context, patchJson: string): Promise<boolean> {
        const patch = parseProfilePatch(patchJson);
        if (!patch) throw new ContractError(RegistryErrorCode.InvalidInput);
        return this.unwrap(await this.registry(ctx).updateProfile(patch));
    }

    @Transaction()
    @Returns('boolean')
    async DeactivateFarmer(ctx: Context, farmer: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).deactivate(farmer));
    }

    @Transaction()
    @Returns('boolean')
    async SetRegistrationFee(ctx: Context, fee: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).setRegistrationFee(parseInteger(fee)));
    }

    @Transaction()
    @Returns('boolean')
    async SetVerifier(ctx: Context, verifier: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).setVerifier(verifier));
    }

    @Transaction()
    @Returns('boolean')
    async TransferOwnership(ctx: Context, owner: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).transferOwnership(owner));
    }

    @Transaction()
    @Returns('boolean')
    async WithdrawFees(ctx: Context, amount: string): Promise<boolean> {
        return this.unwrap(await this.registry(ctx).withdrawFees(parseInteger(amount)));
    }

    @Transaction()
    @Returns('number')
    async FundAccount(ctx: Context, account: string, amount: string): Promise<number> {
        return this.unwrap(await this.registry(ctx).fundAccount(account, parseInteger(amount)));
    }

    @Transaction(false)
    @Returns('string')
    async GetFarmerProfile(ctx: Context, farmer: string): Promise<string> {
        return JSON.stringify(await this.registry(ctx).getProfile(farmer));
    }

    @Transaction(false)
    @Returns('string')
    async GetFarmerById(ctx: Context, id: string): Promise<string> {
        return JSON.stringify(await this.registry(ctx).getById(parseInteger(id)));
    }

    @Transaction(false)
    @Returns('boolean')
    async IsFarmerVerified(ctx: Context, farmer: string): Promise<boolean> {
        return this.registry(ctx).isVerified(farmer);
    }

    @Transaction(false)
    @Returns('string')
    async GetContractOwner(ctx: Context): Promise<string> {
        return this.registry(ctx).getOwner();
    }

    @Transaction(false)
    @Returns('string')
    async GetVerifier(ctx: Context): Promise<string> {
        return this.registry(ctx).getVerifier();
    }

    @Transaction(false)
    @Returns('number')
    async GetRegistrationFee(ctx: Context): Promise<number> {
        return this.registry(ctx).getFee();
    }

    @Transaction(false)
    @Returns('number')
    async GetContractBalance(ctx: Context): Promise<number> {
        return this.registry(ctx).getContractBalance();
    }

    @Transaction(false)
    @Returns('number')
    async GetAccountBalance(ctx: Context, account: string): Promise<number> {
        return this.registry(ctx).getAccountBalance(account);
    }
}
