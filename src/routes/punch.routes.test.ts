import axios, { AxiosInstance } from 'axios';
import express from 'express';
import http from 'http';
import type { AddressInfo } from 'net';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import punchRoutes from './punch.routes';
import syncRoutes from './sync.routes';
import { createPunchController } from '../controllers/punch.controller';
import { createSyncController } from '../controllers/sync.controller';
import { PunchCoordinator } from '../services/punch-coordinator.service';
import { QueueService } from '../services/queue.service';
import { SyncManager } from '../services/sync-manager.service';
import { NoCamera } from '../services/camera.service';
import { NetworkError, ServiceFault } from '../utils/errors';
import { FakeGateway, makeTempDir, removeTempDir } from '../testing/fakes';

const PUNCHED_AT = '2024-05-06T08:30:15.000Z';

describe('punch and sync routes', () => {
    let dir: string;
    let queue: QueueService;
    let gateway: FakeGateway;
    let server: http.Server;
    let client: AxiosInstance;

    beforeEach(async () => {
        dir = makeTempDir();
        queue = new QueueService({ dir, maxRetryAttempts: 10, backoffBaseSeconds: 5, backoffCapSeconds: 300 });
        gateway = new FakeGateway();
        const clock = () => new Date(PUNCHED_AT);
        const syncManager = new SyncManager(queue, gateway, { batchSize: 50 }, clock);
        const coordinator = new PunchCoordinator(
            queue,
            gateway,
            new NoCamera(),
            syncManager,
            { rejectionCacheSeconds: 5 },
            clock
        );

        const app = express();
        app.use(express.json({ limit: '5mb' }));
        app.use('/punch', punchRoutes(createPunchController(coordinator, queue)));
        app.use('/sync', syncRoutes(createSyncController(syncManager)));

        server = http.createServer(app);
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address: AddressInfo | string | null = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server has no TCP address');
        }
        client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    });

    afterEach(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        removeTempDir(dir);
    });

    it('records a punch online', async () => {
        const response = await client.post('/punch', { employeeId: '12345' });

        expect(response.status).toBe(200);
        expect(response.data).toMatchObject({
            success: true,
            offline: false,
            status: 'online',
            message: 'Punch recorded successfully',
            punchTimestamp: PUNCHED_AT,
            employeeName: 'Jane Doe',
            punchType: 'checkin',
            weeklyHours: 12.5,
        });
    });

    it('decodes a photo sent by the kiosk', async () => {
        await client.post('/punch', {
            employeeId: 'TE00700',
            departmentOverride: 7,
            photo: Buffer.from('jpeg-bytes').toString('base64'),
        });

        expect(gateway.submitCalls).toEqual([{ rawEmployeeId: 'TE00700', punchTimestamp: PUNCHED_AT, departmentOverride: 7 }]);
        expect(gateway.uploadCalls).toEqual([{ imageEmployeeId: '00700', photo: 'jpeg-bytes', punchTimestamp: PUNCHED_AT }]);
    });

    it('rejects a malformed request body', async () => {
        const response = await client.post('/punch', { departmentOverride: 'sales' });

        expect(response.status).toBe(400);
        expect(response.data).toMatchObject({ success: false, error: 'Invalid punch request' });
        expect(gateway.submitCalls).toEqual([]);
    });

    it('refuses a photo that is empty or not base64', async () => {
        for (const photo of ['', 'not base64!']) {
            const response = await client.post('/punch', { employeeId: '12345', photo });

            expect(response.status).toBe(400);
            expect(response.data).toMatchObject({ success: false, error: 'Invalid punch request' });
        }
        expect(gateway.submitCalls).toEqual([]);
        expect(await queue.size()).toBe(0);
    });

    it('answers a blank employee id as invalid', async () => {
        const response = await client.post('/punch', { employeeId: '   ' });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({
            success: false,
            offline: false,
            status: 'invalid',
            message: 'Employee ID is required',
            punchId: null,
            punchTimestamp: null,
        });
    });

    it('answers a rejected punch with 422', async () => {
        gateway.submitFailures.push(new ServiceFault('Shift has finished. No punch recorded.', { exceptionCode: 3 }));

        const response = await client.post('/punch', { employeeId: '12345' });

        expect(response.status).toBe(422);
        expect(response.data).toMatchObject({
            success: false,
            status: 'rejected',
            message: 'Shift has finished. No punch recorded.',
            exceptionCode: 3,
        });
    });

    it('lists queued punches and drains them on demand', async () => {
        gateway.submitFailures.push(new NetworkError('RecordSwipeSummary failed: ECONNREFUSED'));
        const punched = await client.post('/punch', { employeeId: '12345' });
        expect(punched.data).toMatchObject({ success: true, offline: true, status: 'offline' });

        const queued = await client.get('/punch/queue');
        expect(queued.data).toMatchObject({
            success: true,
            stats: { total: 1, pending: 1, rejected: 0, oldestPunchTimestamp: PUNCHED_AT },
            items: [{ rawEmployeeId: '12345', status: 'OfflineQueued' }],
        });

        const run = await client.post('/sync/run');
        expect(run.data).toMatchObject({
            success: true,
            message: 'Synced 1 out of 1 queued punches',
            summary: { total: 1, synced: 1 },
        });

        const status = await client.get('/sync/status');
        expect(status.data).toMatchObject({ success: true, running: false, status: { synced: 1 } });
        expect(await queue.size()).toBe(0);
    });

    it('accepts a connectivity signal', async () => {
        const response = await client.post('/sync/connectivity-restored');

        expect(response.status).toBe(202);
        expect(response.data).toEqual({ success: true });
    });
});
