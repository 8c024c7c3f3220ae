export enum ModerationStatus {
    PENDING = 'pending',
    APPROVED = 'approved',
    REJECTED = 'rejected'
}

export type ModerationOutcome = ModerationStatus.APPROVED | ModerationStatus.REJECTED;

export interface PracticeLogEntry {
    docType: 'practice';
    farmer: string;
    sequence: number;                   // Dense per farmer, from 0
    practiceType: string;               // e.g. "Cover Cropping"
    category: string;                   // e.g. "Soil Health"
    timestamp: number;
    details: string;
    evidenceHash: string | null;        // Opaque reference to off-chain evidence
    moderationStatus: ModerationStatus;
    moderationNotes: string | null;
    moderationTimestamp: number | null;
}

export function isModerationOutcome(status: string): status is ModerationOutcome {
    return status === ModerationStatus.APPROVED || status === ModerationStatus.REJECTED;
}
