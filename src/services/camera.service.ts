import axios, { AxiosInstance } from 'axios';
import type { Config } from '../utils/config';
import logger from '../utils/logger';
import type { Camera } from '../types/punch';

/**
 * Grabs a JPEG from an IP camera's snapshot endpoint.
 */
export class SnapshotCamera implements Camera {
    private client: AxiosInstance;

    constructor(
        private readonly snapshotUrl: string,
        timeoutSeconds: number
    ) {
        this.client = axios.create({
            timeout: timeoutSeconds * 1000,
            responseType: 'arraybuffer',
        });
    }

    async capturePhoto(imageEmployeeId: string, punchTimestamp: Date): Promise<Buffer | null> {
        const response = await this.client.get<ArrayBuffer>(this.snapshotUrl);
        const photo = Buffer.from(response.data);

        if (photo.length === 0) {
            logger.warn('Camera returned an empty snapshot', { imageEmployeeId });
            return null;
        }

        logger.debug('Photo captured', {
            imageEmployeeId,
            punchTimestamp: punchTimestamp.toISOString(),
            bytes: photo.length,
        });
        return photo;
    }
}

/**
 * Kiosk without a camera: every punch goes out without a photo.
 */
export class NoCamera implements Camera {
    async capturePhoto(): Promise<Buffer | null> {
        return null;
    }
}

export function createCamera(settings: Config['camera']): Camera {
    if (settings.snapshotUrl) {
        logger.info('Using snapshot camera', { url: settings.snapshotUrl });
        return new SnapshotCamera(settings.snapshotUrl, settings.timeoutSeconds);
    }
    logger.info('No camera configured, punches will be sent without photos');
    return new NoCamera();
}
