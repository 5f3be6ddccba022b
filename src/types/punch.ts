export type PunchStatus = 'Received' | 'Submitting' | 'OfflineQueued' | 'Syncing' | 'Synced' | 'Rejected';

export type PhotoState = 'pending' | 'uploaded' | 'unavailable';

export interface PunchPhoto {
    /** Blob file name inside the queue's photo directory */
    ref: string;
    state: PhotoState;
}

export interface PunchRecord {
    id: string;
    rawEmployeeId: string;
    imageEmployeeId: string;
    /** ISO-8601 UTC, captured once at creation */
    punchTimestamp: string;
    departmentOverride?: number;
    photo: PunchPhoto | null;
    status: PunchStatus;
    /** Set once the remote service accepted the swipe; the swipe is never resent after that */
    submittedAt: string | null;
    syncAttempts: number;
    lastError: string | null;
    nextRetryAt: string | null;
    createdAt: string;
}

export type PunchType = 'checkin' | 'checkout';

export interface PunchResult {
    firstName: string;
    lastName: string;
    punchType: PunchType | null;
    weeklyHours: number | null;
    exceptionCode: number | null;
}

/**
 * Remote attendance service as seen by the coordinator and the sync manager.
 */
export interface RemotePunchGateway {
    submitPunch(rawEmployeeId: string, punchTimestamp: Date, departmentOverride?: number): Promise<PunchResult>;
    uploadPhoto(imageEmployeeId: string, photoBytes: Buffer, punchTimestamp: Date): Promise<void>;
}

export interface Camera {
    capturePhoto(imageEmployeeId: string, punchTimestamp: Date): Promise<Buffer | null>;
}

export type PunchOutcomeStatus = 'online' | 'offline' | 'rejected' | 'invalid' | 'error';

export interface PunchOutcome {
    status: PunchOutcomeStatus;
    message: string;
    punchId: string | null;
    punchTimestamp: string | null;
    employeeName?: string;
    punchType?: PunchType | null;
    weeklyHours?: number | null;
    exceptionCode?: number;
}

export type PunchResultListener = (status: PunchOutcomeStatus, message: string, weeklyHours?: number | null) => void;

export interface SyncSummary {
    total: number;
    synced: number;
    failed: number;
    rejected: number;
    skipped: number;
    stoppedEarly: boolean;
    startedAt: string;
    finishedAt: string;
}

export interface QueueStats {
    total: number;
    pending: number;
    syncing: number;
    rejected: number;
    inBackoff: number;
    oldestPunchTimestamp: string | null;
}
