import { z } from 'zod';

export const punchStatusSchema = z.enum(['Received', 'Submitting', 'OfflineQueued', 'Syncing', 'Synced', 'Rejected']);

export const punchRecordSchema = z.object({
    id: z.string().min(1),
    rawEmployeeId: z.string().min(1),
    imageEmployeeId: z.string(),
    punchTimestamp: z.string().datetime(),
    departmentOverride: z.number().int().optional(),
    photo: z
        .object({
            ref: z.string().min(1),
            state: z.enum(['pending', 'uploaded', 'unavailable']),
        })
        .nullable(),
    status: punchStatusSchema,
    submittedAt: z.string().nullable(),
    syncAttempts: z.number().int().min(0),
    lastError: z.string().nullable(),
    nextRetryAt: z.string().nullable(),
    createdAt: z.string(),
});

// Body of POST /punch
export const punchRequestSchema = z.object({
    employeeId: z.string(),
    departmentOverride: z.number().int().positive().optional(),
    // base64 JPEG from the kiosk camera preview
    photo: z.string().min(1).base64().optional(),
});
