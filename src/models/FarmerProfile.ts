export enum VerificationStatus {
    PENDING = 'pending',
    VERIFIED = 'verified',
    REJECTED = 'rejected'
}

export type VerificationOutcome = VerificationStatus.VERIFIED | VerificationStatus.REJECTED;

export interface FarmerProfile {
    docType: 'farmer';
    id: number;                         // Sequential from 1, never reused
    name: string;
    location: string;
    farmSize: number;
    registrationTimestamp: number;      // Logical clock height
    verificationStatus: VerificationStatus;
    verificationTimestamp: number | null;
    additionalInfo: string;
    active: boolean;                    // Cleared by the owner, never restored
}

/** Fields a verified farmer may change. An absent key keeps the stored value. */
export interface ProfilePatch {
    name?: string;
    location?: string;
    farmSize?: number;
    additionalInfo?: string;
}

export function isVerificationOutcome(status: string): status is VerificationOutcome {
    return status === VerificationStatus.VERIFIED || status === VerificationStatus.REJECTED;
}
