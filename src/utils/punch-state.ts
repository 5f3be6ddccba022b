import type { PunchRecord, PunchStatus } from '../types/punch';

const TRANSITIONS: Record<PunchStatus, readonly PunchStatus[]> = {
    Received: ['Submitting', 'OfflineQueued'],
    Submitting: ['Synced', 'Rejected', 'OfflineQueued'],
    OfflineQueued: ['Syncing', 'Rejected'],
    // back to OfflineQueued after a transient failure
    Syncing: ['Synced', 'Rejected', 'OfflineQueued'],
    Synced: [],
    Rejected: [],
};

export function canTransition(from: PunchStatus, to: PunchStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PunchStatus): boolean {
    return TRANSITIONS[status].length === 0;
}

/**
 * Return a copy of the record in the new status, or throw if the move is not allowed.
 */
export function transition(record: PunchRecord, to: PunchStatus): PunchRecord {
    if (!canTransition(record.status, to)) {
        throw new Error(`Invalid punch status transition ${record.status} -> ${to} for ${record.id}`);
    }
    return { ...record, status: to };
}
