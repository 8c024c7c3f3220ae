// Role holders and counters of each contract, one record per contract.

export interface RegistryConfig {
    docType: 'registryConfig';
    owner: string;
    verifier: string;
    registrationFee: number;
    contractBalance: number;            // Fees collected, less withdrawals
    nextFarmerId: number;
}

export interface PracticeLogConfig {
    docType: 'practiceLogConfig';
    owner: string;
    moderator: string;
}
