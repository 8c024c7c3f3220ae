export interface ChaincodeConfig {
    registrationFee: number;
    genesisHeight: number;
    registryAccount: string;
}

const DEFAULT_REGISTRATION_FEE = 1000000;

function feeFromEnv(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') return DEFAULT_REGISTRATION_FEE;
    const fee = Number(raw);
    if (!Number.isInteger(fee) || fee < 0) {
        throw new Error(`REGISTRATION_FEE must be a non-negative integer, got "${raw}"`);
    }
    return fee;
}

// Deploy-time defaults. Runtime changes go through the owner transactions.
export const config: ChaincodeConfig = {
    registrationFee: feeFromEnv(process.env.REGISTRATION_FEE),
    genesisHeight: 1,
    registryAccount: 'farmer-registry',
};
